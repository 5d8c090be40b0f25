export class TargetInvocationException extends Error {
    public InnerException: unknown;

    constructor(innerException: unknown, message: string = "Exception has been thrown by the target of an invocation.") {
        super(message, { cause: innerException });
        this.name = "TargetInvocationException";
        this.InnerException = innerException;
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
