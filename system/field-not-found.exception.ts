export class FieldNotFoundException extends Error {
    public FieldName: string;

    constructor(fieldName: string, message?: string) {
        super(message ?? `Field not found: ${fieldName}`);
        this.name = "FieldNotFoundException";
        this.FieldName = fieldName;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
