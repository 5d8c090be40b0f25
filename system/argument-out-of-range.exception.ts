import { ArgumentException } from "./argument.exception";

export class ArgumentOutOfRangeException extends ArgumentException {
    public ActualValue?: unknown;

    constructor(paramName?: string, actualValue?: unknown, message?: string) {
        super(message ?? "Specified argument was out of the range of valid values.", paramName);
        this.name = "ArgumentOutOfRangeException";
        this.ActualValue = actualValue;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
