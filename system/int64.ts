import { ArgumentOutOfRangeException } from "./argument-out-of-range.exception";
import { ValueType } from "./value-type";

export class Int64 extends ValueType<bigint> {
    public static readonly MinValue: bigint = -9223372036854775808n;
    public static readonly MaxValue: bigint = 9223372036854775807n;

    constructor(value: bigint | number) {
        super(Int64.toBigInt(value));
    }

    private static toBigInt(value: bigint | number): bigint {
        if (typeof value === "number" && !Number.isInteger(value)) {
            throw new ArgumentOutOfRangeException("value", value);
        }
        const result = BigInt(value);
        if (result < Int64.MinValue || result > Int64.MaxValue) {
            throw new ArgumentOutOfRangeException("value", value);
        }
        return result;
    }
}
