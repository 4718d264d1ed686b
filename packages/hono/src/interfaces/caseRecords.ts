/**
 * Source of court case data served by the protected endpoints.
 */
export interface CaseRecords {
  /**
   * Looks up the process number registered for a protocol.
   *
   * @param protocol - Protocol identifier supplied by the caller
   * @returns The process number, undefined when the protocol is unknown
   */
  findProcessNumber(protocol: string): Promise<string | undefined>;

  /** Returns the full text of the process document */
  getProcessText(): Promise<string>;
}
