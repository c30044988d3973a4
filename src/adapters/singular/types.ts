/**
 * Singular control app types.
 * Shapes of the document model returned by the model endpoint and of the
 * items accepted by the control endpoint.
 */

// ============================================================================
// Document Model
// ============================================================================

/**
 * One controllable field of a subcomposition.
 */
export interface FieldMeta {
  id: string;
  title: string;
  /** Free-form: "number", "checkbox", "timecontrol", ... */
  type: string;
}

/**
 * A composition as delivered by the model endpoint, children included.
 * Identity, name and field list are null when the remote document omits them.
 */
export interface CompositionTree {
  id: string | null;
  name: string | null;
  model: FieldMeta[] | null;
  subcompositions: CompositionTree[];
}

/**
 * A complete, addressable composition after flattening.
 */
export interface RemoteNode {
  id: string;
  name: string;
  fields: ReadonlyMap<string, FieldMeta>;
}

// ============================================================================
// Control
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type AnimationState = 'In' | 'Out';

export type TimerCommand = 'start' | 'pause' | 'reset';

/**
 * Value written to a "timecontrol" field.
 */
export interface TimeControlValue {
  [key: string]: JsonValue;
  UTC: number;
  isRunning: boolean;
  value: number;
}

/**
 * One entry of a control PATCH body.
 */
export interface ControlItem {
  subCompositionId: string;
  state?: AnimationState;
  payload?: Record<string, JsonValue>;
}

export interface ControlPatchResponse {
  status: number;
  body: string;
}

/**
 * The two calls made against a control app.
 */
export interface ControlAppTransport {
  fetchControlModel(token: string): Promise<CompositionTree[]>;
  patchControl(token: string, items: ControlItem[]): Promise<ControlPatchResponse>;
}
