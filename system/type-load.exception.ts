export class TypeLoadException extends Error {
    public TypeName: string;

    constructor(typeName: string, message: string = `Could not load type ${typeName}.`) {
        super(message);
        this.name = "TypeLoadException";
        this.TypeName = typeName;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
