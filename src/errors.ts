export type NotInvertibleReason = 'shape' | 'non-finite' | 'singular';

/**
 * Thrown by the solver when a matrix has no inverse: it is empty, ragged or
 * not square (`shape`), has a NaN or infinite entry (`non-finite`), or is
 * singular within tolerance (`singular`).
 */
export class NotInvertibleError extends Error {
  constructor(
    message: string,
    public readonly reason: NotInvertibleReason,
    public readonly rows: number,
    public readonly columns: number
  ) {
    super(message);
    this.name = 'NotInvertibleError';
  }
}
