import { type ChildProcess, spawn } from 'node:child_process';
import { connect, createServer } from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import { logger, type ProcessHandle, type ProcessHost, type SpawnRequest } from '@playhub/core';

/**
 * Configuration for the process host.
 */
export interface NodeProcessHostConfig {
  /** Interpreter the server entry is passed to */
  command: string;
  /** Interface ports are reserved and probed on */
  bindHost: string;
  /** How long a server may take to accept connections on its port */
  readyTimeoutMs: number;
  probeIntervalMs: number;
}

const DEFAULT_CONFIG: NodeProcessHostConfig = {
  command: process.execPath,
  bindHost: '127.0.0.1',
  readyTimeoutMs: 3000,
  probeIntervalMs: 100,
};

class ChildProcessHandle implements ProcessHandle {
  private exitCode: number | null | undefined;
  private readonly listeners: Array<(code: number | null) => void> = [];

  constructor(private readonly child: ChildProcess) {
    child.once('exit', (code) => {
      this.exitCode = code;
      for (const listener of this.listeners.splice(0)) {
        listener(code);
      }
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.exitCode !== undefined;
  }

  get code(): number | null {
    return this.exitCode ?? null;
  }

  onExit(listener: (code: number | null) => void): void {
    if (this.exitCode !== undefined) {
      listener(this.exitCode);
      return;
    }
    this.listeners.push(listener);
  }

  kill(): void {
    if (this.exitCode === undefined) {
      this.child.kill('SIGTERM');
    }
  }
}

/**
 * Runs game servers as child processes of the lobby.
 */
export class NodeProcessHost implements ProcessHost {
  private readonly config: NodeProcessHostConfig;

  constructor(config: Partial<NodeProcessHostConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Ask the OS for an unused port by binding port 0 and releasing it.
   */
  freePort(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer();
      server.unref();
      server.once('error', reject);
      server.listen(0, this.config.bindHost, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          server.close();
          reject(new Error('Could not determine a free port'));
          return;
        }
        const { port } = address;
        server.close(() => resolve(port));
      });
    });
  }

  async spawn(request: SpawnRequest): Promise<ProcessHandle> {
    const child = spawn(this.config.command, [request.executable, ...request.args], {
      cwd: request.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });

    const handle = new ChildProcessHandle(child);
    child.on('error', (err) => {
      logger.warn('Game server process error', { pid: child.pid ?? null, error: err.message });
    });
    child.stdout?.on('data', (chunk: Buffer) => {
      logger.debug('Game server output', {
        pid: child.pid ?? null,
        output: chunk.toString().trim(),
      });
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      logger.debug('Game server error output', {
        pid: child.pid ?? null,
        output: chunk.toString().trim(),
      });
    });

    if (request.readyPort !== undefined) {
      try {
        await this.waitForPort(handle, request.readyPort);
      } catch (err) {
        handle.kill();
        throw err;
      }
    }
    return handle;
  }

  private async waitForPort(handle: ChildProcessHandle, port: number): Promise<void> {
    const deadline = Date.now() + this.config.readyTimeoutMs;
    while (Date.now() < deadline) {
      if (handle.exited) {
        throw new Error(`Game server exited with code ${handle.code ?? 'null'} before listening`);
      }
      if (await this.canConnect(port)) {
        return;
      }
      await delay(this.config.probeIntervalMs);
    }
    throw new Error(
      `Game server did not listen on port ${port} within ${this.config.readyTimeoutMs}ms`
    );
  }

  private canConnect(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = connect({ port, host: this.config.bindHost });
      socket.once('connect', () => {
        socket.destroy();
        resolve(true);
      });
      socket.once('error', () => {
        socket.destroy();
        resolve(false);
      });
    });
  }
}
