export class ParseError extends Error {
  constructor(
    message: string,
    public readonly position?: number
  ) {
    super(message)
    this.name = 'ParseError'
  }
}
