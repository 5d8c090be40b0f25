import { ArgumentException } from "./argument.exception";
import { ValueType } from "./value-type";

export class Char extends ValueType<string> {
    constructor(value: string) {
        if (value.length !== 1) {
            throw new ArgumentException("A char holds exactly one UTF-16 code unit.", "value");
        }
        super(value);
    }
}
