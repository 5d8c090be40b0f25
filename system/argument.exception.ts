export class ArgumentException extends Error {
    public ParamName?: string;

    constructor(message: string = "Value does not fall within the expected range.", paramName?: string) {
        super(message);
        this.name = "ArgumentException";
        this.ParamName = paramName;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
