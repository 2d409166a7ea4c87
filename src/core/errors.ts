/**
 * Machine-readable error types raised by the bridge core.
 */
export class BridgeError extends Error {
  readonly code: 'PRODUCER_FAILED' | 'SINK_ALREADY_REGISTERED'

  constructor(code: BridgeError['code'], message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BridgeError'
    this.code = code
  }
}

/**
 * Labels a failure a push-source reported through `onError`. Subscribers get
 * the source's own error unchanged; consumers that surface it (the CLI) wrap
 * it here, keeping the original as `cause`.
 */
export class ProducerError extends BridgeError {
  constructor(cause: unknown) {
    super('PRODUCER_FAILED', `Producer failed: ${describe(cause)}`, { cause })
    this.name = 'ProducerError'
  }
}

export class SinkAlreadyRegisteredError extends BridgeError {
  constructor(device: string) {
    super('SINK_ALREADY_REGISTERED', `${device} already has a registered sink`)
    this.name = 'SinkAlreadyRegisteredError'
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
