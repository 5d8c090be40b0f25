import { withElevatedAccess } from "../../src/access-scope";
import { BindingFlags, Type } from "../../src/reflection";
import { DEFAULT_REFLECTION_OPTIONS, ReflectionOptions } from "../../src/reflection-options";
import { InstantiationException } from "../instantiation.exception";
import { NoAccessibleConstructorException } from "../no-accessible-constructor.exception";
import { TargetInvocationException } from "./target-invocation.exception";

export class Activator {
    // Creates an instance through the parameterless constructor declared on the type, whatever its visibility
    public static CreateInstance(type: Type, options: ReflectionOptions = DEFAULT_REFLECTION_OPTIONS): unknown {
        if (!type.IsClass || type.IsAbstract) {
            throw new InstantiationException(type.FullName, `Cannot create an instance of ${type.FullName} because it is not a concrete class.`);
        }

        const ctor = type.GetConstructor([], BindingFlags.Public | BindingFlags.NonPublic | BindingFlags.Instance);
        if (!ctor) {
            throw new NoAccessibleConstructorException(type.FullName);
        }

        if (type.RequiresEnclosingInstance) {
            throw new InstantiationException(type.FullName, `Cannot create an instance of ${type.FullName} without an enclosing instance.`);
        }
        if (!type._ctor) {
            throw new InstantiationException(type.FullName, `No constructor is bound to ${type.FullName}.`);
        }

        try {
            return withElevatedAccess(ctor, options, () => ctor.Invoke());
        } catch (error) {
            if (error instanceof TargetInvocationException) {
                throw new InstantiationException(type.FullName, `Constructor of ${type.FullName} threw.`, error.InnerException);
            }
            throw error;
        }
    }
}
