import { BaseError } from "@recache/errors"

/**
 * The backing store answered in a way the protocol does not allow. Not an
 * operational failure: it points at a broken adapter or server.
 */
export class BackingStoreProtocolError extends BaseError<"protocol_error"> {
  static replyCount(input: {
    operation: string
    expected: number
    received: number
  }): BackingStoreProtocolError {
    return new BackingStoreProtocolError(
      `${input.operation} expected ${input.expected} replies, received ${input.received}`,
      {
        code: "protocol_error",
        context: { ...input },
        isOperational: false,
      },
    )
  }

  static unexpectedReply(input: {
    operation: string
    position: number
    received: string
  }): BackingStoreProtocolError {
    return new BackingStoreProtocolError(
      `${input.operation} received an unexpected ${input.received} reply at position ${input.position}`,
      {
        code: "protocol_error",
        context: { ...input },
        isOperational: false,
      },
    )
  }
}
