/**
 * Output Module
 *
 * Delivery of finished text: clipboard copy plus optional auto-paste.
 */

export {
  ClipboardService,
  DeliveryError,
  isDeliveryError,
  clipboardCommand,
  pasteCommand,
  PASTE_DELAY_MS,
  type DeliveryReceipt,
  type OutputSink,
  type ClipboardServiceOptions,
} from './ClipboardService';
