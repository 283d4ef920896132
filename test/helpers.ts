import { CodecError } from "../src/errors.js";

export function codecFailure(fn: () => unknown): CodecError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CodecError) return err;
    throw err;
  }
  throw new Error("expected a codec error");
}
