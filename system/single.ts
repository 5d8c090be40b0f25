import { ValueType } from "./value-type";

export class Single extends ValueType<number> {
    // Stored rounded to 32-bit precision
    constructor(value: number) {
        super(Math.fround(value));
    }
}
