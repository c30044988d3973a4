/**
 * TriCaster adapter types.
 */

// ============================================================================
// XML Document
// ============================================================================

export interface XmlElement {
  tag: string;
  attributes: Readonly<Record<string, string>>;
  children: XmlElement[];
}

export interface XmlDocument {
  root: XmlElement;
}

// ============================================================================
// Dictionary Data
// ============================================================================

/**
 * Dictionary keys that carry DDR clip timing, in the order they are tried.
 */
export const DURATION_DICTIONARY_KEYS = ['ddr_timecode', 'timecode'] as const;

export type DurationDictionaryKey = (typeof DURATION_DICTIONARY_KEYS)[number];

/**
 * Number of DDRs reported in status summaries.
 */
export const DDR_COUNT = 4;

export interface SlotDuration {
  /** Clip duration in seconds */
  seconds: number;
  /** Clip framerate, null when the device did not report a usable one */
  framerate: number | null;
}

/**
 * Raw per-DDR status as reported by the device.
 */
export interface SlotStatus {
  duration: string | null;
  elapsed: string | null;
  remaining: string | null;
  framerate: string | null;
  playing: boolean;
  filename: string | null;
}

export interface TallyState {
  program: string[];
  preview: string[];
}

// ============================================================================
// Connection
// ============================================================================

export interface DeviceConnection {
  host: string;
  user?: string | undefined;
  password?: string | undefined;
  timeoutMs: number;
}

export interface ConnectionTestResult {
  ok: boolean;
  host?: string;
  response?: string;
  error?: string;
}

/**
 * The calls the sync engine makes against the playback device.
 */
export interface PlaybackDeviceTransport {
  fetchPlaybackStatus(connection: DeviceConnection, key: DurationDictionaryKey): Promise<XmlDocument>;
  readSlotDuration(connection: DeviceConnection, slot: number): Promise<SlotDuration>;
}
