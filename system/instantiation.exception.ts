export class InstantiationException extends Error {
    public TypeName: string;
    public InnerException?: unknown;

    constructor(typeName: string, message: string, innerException?: unknown) {
        super(message, innerException === undefined ? undefined : { cause: innerException });
        this.name = "InstantiationException";
        this.TypeName = typeName;
        this.InnerException = innerException;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
