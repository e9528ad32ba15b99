/**
 * stdout/stderr carry process output; info/success/error are progress
 * notes emitted by the reconciler itself.
 */
export type StreamMessageType = 'stdout' | 'stderr' | 'info' | 'success' | 'error';

export interface StreamMessage {
  type: StreamMessageType;
  content: string;
}
