export class IncorrectReturnTypeException extends Error {
    public ReturnType: string;

    constructor(returnType: string) {
        super(`Incorrect return type: ${returnType}`);
        this.name = "IncorrectReturnTypeException";
        this.ReturnType = returnType;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
