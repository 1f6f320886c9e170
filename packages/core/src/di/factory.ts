import type { Factory } from "@wirebox/types";
import { InvalidFactorySignatureException } from "../errors/container-exception";

const UNSUPPORTED_FUNCTION_KINDS: Record<string, string> = {
  "[object AsyncFunction]": "async functions",
  "[object GeneratorFunction]": "generator functions",
  "[object AsyncGeneratorFunction]": "async generator functions",
};

/**
 * Checks a factory once, when it is registered, so a bad definition fails
 * before anything tries to resolve it. The return type itself is enforced by
 * the `Factory` signature at compile time.
 */
export function assertFactory(factory: unknown, subject: string): asserts factory is Factory {
  if (typeof factory !== "function") {
    throw new InvalidFactorySignatureException(
      subject,
      `A factory must be a function, received ${typeof factory}.`,
    );
  }

  const kind = UNSUPPORTED_FUNCTION_KINDS[Object.prototype.toString.call(factory)];
  if (kind) {
    throw new InvalidFactorySignatureException(
      subject,
      `A factory must return an object synchronously; ${kind} are not supported.`,
    );
  }

  if (/^class[\s{]/.test(Function.prototype.toString.call(factory))) {
    throw new InvalidFactorySignatureException(
      subject,
      `A factory must be a callable function, received class ${factory.name}.`,
    );
  }

  if (factory.length > 2) {
    throw new InvalidFactorySignatureException(
      subject,
      `A factory takes (container, params), but declares ${factory.length} parameters.`,
    );
  }
}

/** Checks what a factory produced. Services are always object or function values. */
export function assertServiceValue(value: unknown, subject: string): object {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    throw new InvalidFactorySignatureException(
      subject,
      `A factory must return an object, received ${value === null ? "null" : typeof value}.`,
    );
  }

  if ("then" in value && typeof value.then === "function") {
    throw new InvalidFactorySignatureException(
      subject,
      "A factory must return an object synchronously, received a promise.",
    );
  }

  return value;
}
