import * as pty from '@lydell/node-pty';
import * as os from 'os';
import { TransportError } from '../errors';
import type { IDisposable, ITerminalBackend, TransportPayload } from '../types';

export interface LocalPtyOptions {
  cols?: number;
  rows?: number;
  cwd?: string;
  env?: { [key: string]: string | undefined };
}

export class LocalPty implements ITerminalBackend {
  private ptyProcess: pty.IPty | undefined;
  private _disposed = false;
  private _exited = false;

  // Arguments for spawn
  private shell: string;
  private args: string[];
  private options: LocalPtyOptions;

  // Event listeners
  private _dataListeners: ((data: string) => void)[] = [];
  private _exitListeners: ((code: number, signal?: number) => void)[] = [];

  constructor(
    shell: string,
    args: string[] = [],
    options: LocalPtyOptions = {}
  ) {
    this.shell = shell;
    this.args = args;
    this.options = options;
  }

  public async spawn(): Promise<void> {
    if (this._disposed) {
      throw new Error('LocalPty is disposed. Cannot spawn a new process on a disposed instance.');
    }
    if (this.ptyProcess) {
      throw new Error('LocalPty is already spawned');
    }

    this.ptyProcess = pty.spawn(this.shell, this.args, {
      name: 'xterm-256color',
      cols: this.options.cols ?? 80,
      rows: this.options.rows ?? 24,
      cwd: this.options.cwd ?? process.cwd(),
      env: this.options.env ?? process.env,
      encoding: 'utf8',
    });

    this.ptyProcess.onData((data) => {
      this._dataListeners.forEach(l => l(data));
    });

    this.ptyProcess.onExit(({ exitCode, signal }) => {
      this._exited = true;
      this._exitListeners.forEach(l => l(exitCode, signal ?? 0));
    });

    // Switch the Windows console code page to UTF-8
    if (os.platform() === 'win32') {
      this.write('chcp 65001\r');
      this.write('Clear-Host\r');
      await new Promise(resolve => setTimeout(resolve, 100));
    }
  }

  // --- ITerminalBackend implementation ---

  public get id(): number {
    return this.ptyProcess?.pid ?? -1;
  }

  public get processName(): string {
    return this.ptyProcess?.process ?? '';
  }

  public write(data: TransportPayload): void {
    if (!this.ptyProcess) {
      if (this._disposed) {
        throw new TransportError('LocalPty is disposed');
      }
      console.warn('[LocalPty] write called before spawn');
      return;
    }
    if (this._exited) {
      throw new TransportError(`LocalPty process has exited (pid: ${this.id})`);
    }
    try {
      this.ptyProcess.write(this.toText(data));
    } catch (error) {
      throw new TransportError(`Write failed (pid: ${this.id})`, { cause: error });
    }
  }

  // node-pty writes synchronously to the pty; only a closed pty can fail here
  public flush(): void {
    if (this._disposed || this._exited) {
      throw new TransportError('LocalPty is closed');
    }
  }

  public resize(cols: number, rows: number): void {
    if (!this.ptyProcess) return;
    try {
      this.ptyProcess.resize(cols, rows);
    } catch (error) {
      console.warn(`[LocalPty] Resize failed (pid: ${this.id}):`, error);
    }
  }

  public dispose(): void {
    this._disposed = true;
    if (this.ptyProcess) {
      this.ptyProcess.kill();
      this.ptyProcess = undefined;
    }
    this._dataListeners = [];
    this._exitListeners = [];
  }

  public onData(listener: (data: string) => void): IDisposable {
    if (this._disposed) {
      return { dispose: () => {} };
    }
    this._dataListeners.push(listener);
    return {
      dispose: () => {
        this._dataListeners = this._dataListeners.filter(l => l !== listener);
      },
    };
  }

  public onExit(listener: (code: number, signal?: number) => void): IDisposable {
    if (this._disposed) {
      return { dispose: () => {} };
    }
    this._exitListeners.push(listener);
    return {
      dispose: () => {
        this._exitListeners = this._exitListeners.filter(l => l !== listener);
      },
    };
  }

  // node-pty sends strings to the pty as UTF-8, so only UTF-8 bytes survive the round trip
  private toText(data: TransportPayload): string {
    if (typeof data === 'string') return data;
    const bytes = typeof data === 'number' ? Uint8Array.of(data) : data;
    return Buffer.from(bytes).toString('utf8');
  }
}
