import { ValueType } from "./value-type";

export class Int32 extends ValueType<number> {
    public static readonly MinValue: number = -2147483648;
    public static readonly MaxValue: number = 2147483647;

    constructor(value: number) {
        super(ValueType.requireIntegral(value, Int32.MinValue, Int32.MaxValue));
    }
}
