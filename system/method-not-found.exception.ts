export class MethodNotFoundException extends Error {
    public MethodName: string;

    constructor(methodName: string, message?: string) {
        super(message ?? `Method not found: ${methodName}`);
        this.name = "MethodNotFoundException";
        this.MethodName = methodName;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
