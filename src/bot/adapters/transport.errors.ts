export class TransportError extends Error {
  constructor(
    public readonly method: string,
    message: string,
    public readonly status: number | null = null,
    public readonly description: string | null = null,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * The media file referenced by a reply does not exist.
 */
export class MediaNotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly filePath: string,
  ) {
    super(`Media file not found: ${filePath}`);
    this.name = 'MediaNotFoundError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
