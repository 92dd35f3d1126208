/**
 * Audio backend port.
 *
 * The backend runs in its own execution context (a timer, a child process)
 * and only talks to the session through two queues: tagged commands in,
 * tagged events out. Every command carries the sequence number the transport
 * chose for it; every event carries the number of the latest command the
 * backend had applied when it produced the event.
 */

export type AudioCommandBody =
  | { type: 'load'; path: string; duration: number }
  | { type: 'play' }
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'stop' }
  | { type: 'seek'; position: number }
  | { type: 'setVolume'; level: number }
  | { type: 'setMuted'; muted: boolean };

export type AudioCommand = AudioCommandBody & { seq: number };

export type AudioEvent =
  | { type: 'position'; seq: number; position: number }
  | { type: 'endOfTrack'; seq: number }
  | { type: 'error'; seq: number; reason: string };

export interface AudioBackend {
  /** Queue a command. Never blocks. */
  send(command: AudioCommand): void;
  /** Take every event produced since the last call, oldest first. */
  drain(): AudioEvent[];
  /** Release the output stream or child process. */
  dispose(): Promise<void>;
}
