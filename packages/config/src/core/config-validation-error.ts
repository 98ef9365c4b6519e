export class ConfigValidationError extends Error {
  constructor(
    message: string,
    readonly details: string,
  ) {
    super(`${message}\n${details}`)
    this.name = "ConfigValidationError"
  }
}
