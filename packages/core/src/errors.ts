/**
 * Custom error class for J1939 configuration and input errors.
 *
 * Decoding itself never throws: absent or unavailable values come back as
 * `null` or are left out of a frame's results.
 */
export class J1939Error extends Error {
  constructor(
    message: string,
    public readonly code:
      | "INVALID_DATABASE"
      | "DUPLICATE_SPN"
      | "INVALID_HEX"
      | "INVALID_CAN_ID"
      | "OUT_OF_RANGE"
      | "TRACE_PARSE",
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "J1939Error";
  }
}
