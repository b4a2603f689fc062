export class BufferOverflowError extends Error {
  readonly code = 'BUFFER_OVERFLOW';

  constructor(
    readonly size: number,
    readonly capacity: number,
  ) {
    super(`Input of ${size} bytes exceeds the ${capacity}-byte edit buffer`);
    this.name = 'BufferOverflowError';
  }
}
