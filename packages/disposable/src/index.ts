/**
 * @switchyard/disposable - Disposable session controller
 *
 * For providers that must periodically reappear as a brand-new device:
 * bounded message budget, full identity reset, one serialization point per
 * instance.
 *
 * @packageDocumentation
 */

export { DisposableSessionController, DEFAULT_MAX_MESSAGES } from './controller.js';
export { DisposableProvider, type DisposableProviderInfo } from './provider.js';
export { DisposableResetError, type ResetStep } from './errors.js';
export { generateIdentity, maskDeviceId, type DeviceIdentity } from './identity.js';
export { SerialQueue } from './serial-queue.js';
export type {
  DisposableState,
  DisposableBackend,
  DisposableControllerOptions,
  DisposableStatus,
} from './types.js';
