/**
 * TriCaster adapter module.
 * Reads DDR clip timing and sends shortcut commands over the device's HTTP API.
 */

export { TriCasterClient, connectionFromConfig } from './client.js';

export {
  parseXmlDocument,
  findDescendant,
  extractSlotDuration,
  extractSlotStatuses,
  extractTally,
  formatShortcut,
} from './protocol.js';

export {
  DURATION_DICTIONARY_KEYS,
  DDR_COUNT,
  type ConnectionTestResult,
  type DeviceConnection,
  type DurationDictionaryKey,
  type PlaybackDeviceTransport,
  type SlotDuration,
  type SlotStatus,
  type TallyState,
  type XmlDocument,
  type XmlElement,
} from './types.js';
