/**
 * Audio backend that drives an mpv process over its JSON IPC socket
 */

import { spawn } from 'node:child_process';
import { createConnection } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import {
  MessageQueue,
  createLogger,
  type AudioBackend,
  type AudioCommand,
  type AudioEvent,
} from '@riffline/shared';
import { OBSERVE_TIME_POS, encodeRequest, parseMpvLine, toAudioEvent, translateCommand, type MpvArgument } from './mpvProtocol';

const log = createLogger('MpvBackend');

export interface IpcConnection {
  write(chunk: string): void;
  onData(listener: (chunk: string) => void): void;
  onClose(listener: () => void): void;
  close(): void;
}

export interface PlayerProcess {
  onExit(listener: (code: number | null) => void): void;
  kill(): void;
}

export interface MpvBackendOptions {
  mpvPath?: string;
  socketPath?: string;
  connectAttempts?: number;
  connectDelayMs?: number;
  launch?: (mpvPath: string, args: string[]) => PlayerProcess;
  connect?: (socketPath: string) => Promise<IpcConnection>;
}

export function defaultSocketPath(): string {
  return process.platform === 'win32'
    ? `\\\\.\\pipe\\riffline-mpv-${process.pid}`
    : join(tmpdir(), `riffline-mpv-${process.pid}.sock`);
}

function launchMpv(mpvPath: string, args: string[]): PlayerProcess {
  const child = spawn(mpvPath, args, { stdio: 'ignore' });
  return {
    onExit: (listener) => {
      // A failed spawn emits 'error' and then 'exit'
      let reported = false;
      const report = (code: number | null) => {
        if (reported) return;
        reported = true;
        listener(code);
      };
      child.on('exit', (code) => report(code));
      child.on('error', (error) => {
        log.error(`Cannot run ${mpvPath}`, error);
        report(null);
      });
    },
    kill: () => {
      if (child.exitCode === null) child.kill();
    },
  };
}

function connectSocket(socketPath: string): Promise<IpcConnection> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(socketPath);
    socket.setEncoding('utf8');
    socket.once('error', reject);
    socket.once('connect', () => {
      socket.off('error', reject);
      socket.on('error', (error) => log.warn('IPC socket error', error));
      resolve({
        write: (chunk) => {
          socket.write(chunk);
        },
        onData: (listener) => {
          socket.on('data', (data: string) => listener(data));
        },
        onClose: (listener) => {
          socket.on('close', () => listener());
        },
        close: () => {
          socket.end();
        },
      });
    });
  });
}

export class MpvAudioBackend implements AudioBackend {
  private readonly events = new MessageQueue<AudioEvent>();
  private readonly options: Required<Omit<MpvBackendOptions, 'socketPath'>> & { socketPath: string };

  private process: PlayerProcess | null = null;
  private connection: IpcConnection | null = null;
  private pending: string[] = [];
  private buffer = '';
  private nextRequestId = 1;
  private readonly requestSeq = new Map<number, number>();
  // Sequence number of the latest command mpv has acknowledged
  private ackedSeq = 0;
  private sentSeq = 0;
  private exited = false;
  private disposed = false;

  constructor(options: MpvBackendOptions = {}) {
    this.options = {
      mpvPath: options.mpvPath ?? 'mpv',
      socketPath: options.socketPath ?? defaultSocketPath(),
      connectAttempts: options.connectAttempts ?? 40,
      connectDelayMs: options.connectDelayMs ?? 50,
      launch: options.launch ?? launchMpv,
      connect: options.connect ?? connectSocket,
    };
  }

  /**
   * Spawn mpv and connect to its socket. Rejects when mpv cannot be reached.
   */
  async start(): Promise<void> {
    const { mpvPath, socketPath, launch } = this.options;
    const player = launch(mpvPath, [
      '--idle=yes',
      '--no-video',
      '--no-terminal',
      '--keep-open=no',
      `--input-ipc-server=${socketPath}`,
    ]);
    this.process = player;
    player.onExit((code) => this.handleExit(code));

    const connection = await this.connectWithRetry();
    this.connection = connection;
    connection.onData((chunk) => this.receive(chunk));
    connection.onClose(() => {
      if (!this.disposed) log.warn('mpv closed the IPC socket');
    });

    this.write(OBSERVE_TIME_POS, 0);
    for (const line of this.pending) {
      connection.write(line);
    }
    this.pending = [];
    log.info(`Connected to mpv at ${socketPath}`);
  }

  send(command: AudioCommand): void {
    this.sentSeq = command.seq;
    if (this.exited) {
      if (command.type === 'load' || command.type === 'play') {
        this.events.post({ type: 'error', seq: command.seq, reason: 'mpv exited' });
      }
      return;
    }
    for (const args of translateCommand(command)) {
      this.write(args, command.seq);
    }
  }

  drain(): AudioEvent[] {
    return this.events.drain();
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    if (this.connection) {
      this.connection.write(encodeRequest(['quit'], this.nextRequestId++));
      this.connection.close();
    }
    this.process?.kill();
    this.events.close();
  }

  private write(args: MpvArgument[], seq: number): void {
    const requestId = this.nextRequestId++;
    this.requestSeq.set(requestId, seq);
    const line = encodeRequest(args, requestId);
    if (this.connection) {
      this.connection.write(line);
    } else {
      this.pending.push(line);
    }
  }

  private receive(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      this.handleLine(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private handleLine(line: string): void {
    const message = parseMpvLine(line);
    if (!message) return;

    if (message.kind === 'reply') {
      const seq = this.requestSeq.get(message.requestId);
      this.requestSeq.delete(message.requestId);
      if (seq === undefined) return;
      if (message.error !== 'success') {
        log.warn(`mpv rejected request ${message.requestId}: ${message.error}`);
      }
      this.ackedSeq = Math.max(this.ackedSeq, seq);
      return;
    }

    const event = toAudioEvent(message, this.ackedSeq);
    if (event) {
      this.events.post(event);
    }
  }

  private handleExit(code: number | null): void {
    if (this.disposed || this.exited) return;
    this.exited = true;
    log.error(`mpv exited unexpectedly (code ${code ?? 'none'})`);
    // Whatever was playing is gone, so the report counts against the newest command
    this.events.post({ type: 'error', seq: this.sentSeq, reason: 'mpv exited' });
  }

  private async connectWithRetry(): Promise<IpcConnection> {
    const { socketPath, connect, connectAttempts, connectDelayMs } = this.options;
    let lastError: unknown = null;
    for (let attempt = 0; attempt < connectAttempts; attempt++) {
      try {
        return await connect(socketPath);
      } catch (error) {
        lastError = error;
        await delay(connectDelayMs);
      }
    }
    throw new Error(
      `Could not connect to mpv at ${socketPath}: ${lastError instanceof Error ? lastError.message : String(lastError)}`
    );
  }
}
