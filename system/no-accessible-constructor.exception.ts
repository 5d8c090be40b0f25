export class NoAccessibleConstructorException extends Error {
    public TypeName: string;

    constructor(typeName: string) {
        super(`No parameterless constructor declared on ${typeName}.`);
        this.name = "NoAccessibleConstructorException";
        this.TypeName = typeName;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
