/** Thrown for invalid settings, unsupported inputs and reader setup errors */
export class ReaderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReaderConfigError";
  }
}
