export class MemberAccessException extends Error {
    constructor(message: string = "Cannot access member.") {
        super(message);
        this.name = "MemberAccessException";
        Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
    }
}
