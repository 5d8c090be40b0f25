export class IncorrectValueTypeException extends Error {
    public ValueType: string;

    constructor(valueType: string) {
        super(`Incorrect value type: ${valueType}`);
        this.name = "IncorrectValueTypeException";
        this.ValueType = valueType;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
