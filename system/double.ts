import { ValueType } from "./value-type";

export class Double extends ValueType<number> {
    constructor(value: number) {
        super(value);
    }
}
