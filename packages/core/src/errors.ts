/**
 * Thrown when a stored cluster properties payload is present but is not a
 * well-formed JSON mapping. Retrying the read cannot fix it.
 */
export class DocumentDecodeError extends Error {
  public readonly name = 'DocumentDecodeError';

  constructor(
    message: string,
    public readonly reason?: string
  ) {
    super(reason ? `${message}: ${reason}` : message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DocumentDecodeError);
    }
  }
}
