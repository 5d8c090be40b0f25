import { ArgumentOutOfRangeException } from "./argument-out-of-range.exception";

// Base for the boxed primitive values. Each subclass holds exactly one value of its kind.
export abstract class ValueType<T> {
    protected readonly value: T;

    protected constructor(value: T) {
        this.value = value;
    }

    public valueOf(): T {
        return this.value;
    }

    public toString(): string {
        return String(this.value);
    }

    public Equals(other: unknown): boolean {
        return other instanceof ValueType
            && other.constructor === this.constructor
            && other.valueOf() === this.value;
    }

    protected static requireIntegral(value: number, min: number, max: number): number {
        if (!Number.isInteger(value) || value < min || value > max) {
            throw new ArgumentOutOfRangeException("value", value);
        }
        return value;
    }
}
