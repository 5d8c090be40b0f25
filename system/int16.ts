import { ValueType } from "./value-type";

export class Int16 extends ValueType<number> {
    public static readonly MinValue: number = -32768;
    public static readonly MaxValue: number = 32767;

    constructor(value: number) {
        super(ValueType.requireIntegral(value, Int16.MinValue, Int16.MaxValue));
    }
}
