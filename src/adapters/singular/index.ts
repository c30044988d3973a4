/**
 * Singular control app adapter module.
 */

export { SingularClient, type SingularClientSettings } from './client.js';
export { flatten, toCompositionTrees, walkCompositions } from './model.js';
export type {
  AnimationState,
  CompositionTree,
  ControlAppTransport,
  ControlItem,
  ControlPatchResponse,
  FieldMeta,
  JsonValue,
  RemoteNode,
  TimeControlValue,
  TimerCommand,
} from './types.js';
