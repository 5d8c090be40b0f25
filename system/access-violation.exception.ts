export class AccessViolationException extends Error {
    constructor(message: string = "Access elevation is not permitted.") {
        super(message);
        this.name = "AccessViolationException";
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
