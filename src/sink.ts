/**
 * Output sinks: the shared, append-only destination of serialized event lines.
 * A sink is reference counted; it closes when its last reference is released.
 * Writes are synchronous, so one write call lands as one contiguous append.
 */

import { closeSync, openSync, writeSync } from 'node:fs';
import { OutputModuleError, errorMessage } from './errors.js';
import { logDebug, logInfo } from './logger.js';
import { OUTPUT_ERROR_CODES } from './types.js';
import type { ResolvedSinkConfig, SinkConfig } from './types.js';
import { validateSinkConfig } from './validation.js';

export interface OutputSink {
  readonly name: string;
  readonly refCount: number;
  readonly closed: boolean;
  /**
   * Append bytes. The view may be reused by the caller after return, so a sink that
   * keeps data must copy it. Throws on I/O failure.
   */
  write(data: Uint8Array): void;
  retain(): void;
  release(): void;
  /** Ask the sink to reopen its destination before the next write (external log rotation). */
  requestReopen(): void;
}

export abstract class RefCountedSink implements OutputSink {
  private refs = 1;
  private isClosed = false;

  constructor(public readonly name: string) {}

  get refCount(): number {
    return this.refs;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  write(data: Uint8Array): void {
    if (this.isClosed) {
      throw new Error(`write to closed sink ${this.name}`);
    }
    this.writeBytes(data);
  }

  retain(): void {
    if (this.isClosed) {
      throw new Error(`cannot retain closed sink ${this.name}`);
    }
    this.refs += 1;
  }

  release(): void {
    if (this.isClosed) {
      throw new Error(`sink ${this.name} released after close`);
    }
    this.refs -= 1;
    if (this.refs === 0) {
      this.isClosed = true;
      this.close();
    }
  }

  requestReopen(): void {}

  protected abstract writeBytes(data: Uint8Array): void;
  protected abstract close(): void;
}

/**
 * File-backed sink. With a rotation interval the active file is `<path>.<unix-seconds>`
 * and a fresh file is started once the interval has passed.
 */
export class FileSink extends RefCountedSink {
  private fd: number;
  private activePath: string;
  private rotateAt: number;
  private reopenRequested = false;

  constructor(
    private readonly config: ResolvedSinkConfig,
    private readonly now: () => number = Date.now
  ) {
    super(config.path);
    const nowSec = this.nowSec();
    this.activePath = this.pathFor(nowSec);
    this.fd = openSync(this.activePath, config.append ? 'a' : 'w', config.mode);
    this.rotateAt = config.rotateIntervalSec > 0 ? nowSec + config.rotateIntervalSec : 0;
  }

  /** Path of the file currently written to. */
  get path(): string {
    return this.activePath;
  }

  override requestReopen(): void {
    this.reopenRequested = true;
  }

  protected writeBytes(data: Uint8Array): void {
    this.maybeSwitchFile();
    let offset = 0;
    while (offset < data.length) {
      offset += writeSync(this.fd, data, offset, data.length - offset);
    }
  }

  protected close(): void {
    closeSync(this.fd);
    logDebug('Closed file sink', { path: this.activePath });
  }

  private nowSec(): number {
    return Math.floor(this.now() / 1000);
  }

  private pathFor(sec: number): string {
    return this.config.rotateIntervalSec > 0 ? `${this.config.path}.${sec}` : this.config.path;
  }

  private maybeSwitchFile(): void {
    if (this.rotateAt > 0) {
      const nowSec = this.nowSec();
      if (nowSec >= this.rotateAt) {
        this.switchTo(this.pathFor(nowSec), this.config.append ? 'a' : 'w');
        this.rotateAt = nowSec + this.config.rotateIntervalSec;
        this.reopenRequested = false;
        logInfo('Rotated output file', { path: this.activePath });
        return;
      }
    }
    if (this.reopenRequested) {
      // cleared only once the open succeeds, so a failed reopen is retried on the next write
      this.switchTo(this.activePath, 'a');
      this.reopenRequested = false;
      logInfo('Reopened output file', { path: this.activePath });
    }
  }

  /** Opens the new file before closing the old one so a failed open leaves the sink usable. */
  private switchTo(path: string, flags: 'a' | 'w'): void {
    const fd = openSync(path, flags, this.config.mode);
    closeSync(this.fd);
    this.fd = fd;
    this.activePath = path;
  }
}

/** Hands every written line to a callback, for embedding hosts and in-process consumers. */
export class CallbackSink extends RefCountedSink {
  private readonly decoder = new TextDecoder();

  constructor(
    name: string,
    private readonly onLine: (line: string) => void,
    private readonly onClose?: () => void
  ) {
    super(name);
  }

  protected writeBytes(data: Uint8Array): void {
    const text = this.decoder.decode(data);
    for (const line of text.split('\n')) {
      if (line !== '') this.onLine(line);
    }
  }

  protected close(): void {
    this.onClose?.();
  }
}

export interface OpenSinkOptions {
  /** Used when the configuration node names no filename. */
  defaultFilename: string;
  /** Directory that relative filenames resolve against. */
  defaultLogDir?: string;
  now?: () => number;
}

/**
 * Opens a new file sink from a configuration node. Configuration problems throw
 * ValidationError; failure to open the file throws OutputModuleError(SINK_OPEN_FAILED).
 */
export function openSink(conf: SinkConfig | undefined, options: OpenSinkOptions): FileSink {
  const resolved = validateSinkConfig(conf, {
    defaultFilename: options.defaultFilename,
    logDir: options.defaultLogDir,
  });
  try {
    const sink = new FileSink(resolved, options.now);
    logInfo('Opened output file', { path: sink.path, append: resolved.append });
    return sink;
  } catch (err) {
    throw new OutputModuleError(
      OUTPUT_ERROR_CODES.SINK_OPEN_FAILED,
      `failed to open output file ${resolved.path}: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}
