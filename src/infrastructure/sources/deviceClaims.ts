import { SinkAlreadyRegisteredError } from '../../core/errors.js'

// Devices that already report to some sink. Weak so dropped devices can be collected.
const claimed = new WeakSet<object>()

/**
 * Mark `device` as owned by one sink for the rest of its life.
 * Throws `SinkAlreadyRegisteredError` on a second claim.
 */
export function claimDevice(device: object, label: string): void {
  if (claimed.has(device)) {
    throw new SinkAlreadyRegisteredError(label)
  }
  claimed.add(device)
}
