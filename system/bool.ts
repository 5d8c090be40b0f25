import { ValueType } from "./value-type";

export class Bool extends ValueType<boolean> {
    constructor(value: boolean) {
        super(value);
    }
}
