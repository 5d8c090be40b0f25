import { ValueType } from "./value-type";

export class SByte extends ValueType<number> {
    public static readonly MinValue: number = -128;
    public static readonly MaxValue: number = 127;

    constructor(value: number) {
        super(ValueType.requireIntegral(value, SByte.MinValue, SByte.MaxValue));
    }
}
