export abstract class ConversionError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A boolean annotation holds something other than a boolean literal. */
export class AnnotationParseError extends ConversionError {
  constructor(
    readonly tenant: string,
    readonly key: string,
    readonly rawValue: string,
  ) {
    super(`unable to parse ${key} annotation on tenant ${tenant}: "${rawValue}" is not a boolean`);
  }
}

/** The object handed to the converter is not a Tenant of a known version. */
export class ConversionTypeError extends ConversionError {
  constructor(
    readonly apiVersion: string,
    readonly kind: string,
    readonly reason: string,
  ) {
    super(`cannot convert ${kind || '<no kind>'} ${apiVersion || '<no apiVersion>'}: ${reason}`);
  }
}
