// Byte stream interface the protocol layer runs on

/**
 * Ordered, bidirectional byte stream owned by a single session
 */
export interface ByteStream {
  /**
   * True once the stream ended, failed or was closed
   */
  readonly closed: boolean;

  /**
   * Write all bytes
   * @throws ConnectionClosedError if the stream is closed
   */
  write(bytes: Buffer): Promise<void>;

  /**
   * Resolve with exactly `size` bytes, waiting for as many chunks as needed
   * @throws ConnectionClosedError if the stream ends first
   * @throws TimeoutError if the read deadline elapses
   */
  readExactly(size: number): Promise<Buffer>;

  /**
   * Close the stream. A pending read fails with ConnectionClosedError.
   */
  close(): Promise<void>;
}
