/** Thrown when a 3MF package or its model XML cannot be parsed. */
export class ThreeMFParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ThreeMFParseError'
  }
}
