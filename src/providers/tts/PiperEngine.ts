import { spawn } from 'child_process';
import type { ChildProcessWithoutNullStreams } from 'child_process';
import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createInterface } from 'readline';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'PiperEngine' });

export interface PiperEngineOptions {
  binPath: string;
  modelPath: string;
  configPath: string;
  timeoutMs: number;
  /** Extra CLI flags such as --length_scale */
  args: string[];
}

/**
 * One loaded Piper model
 */
export interface IPiperEngine {
  /** @returns WAV bytes */
  synthesize(text: string): Promise<Buffer>;
  close(): Promise<void>;
}

interface PendingRequest {
  resolve: (outputFile: string) => void;
  reject: (error: Error) => void;
}

/**
 * Keeps one `piper --json-input` process alive so the model is loaded once.
 * Each request is a JSON line naming its output file; piper answers with
 * the file path on stdout. Requests are serialized.
 */
export class PiperProcessEngine implements IPiperEngine {
  private child: ChildProcessWithoutNullStreams | null = null;
  private tmpDir: string | null = null;
  private pending: PendingRequest | null = null;
  private tail: Promise<void> = Promise.resolve();
  private stderr = '';
  /** Why the last process ended */
  private exitError: Error | null = null;

  constructor(private opts: PiperEngineOptions) {}

  synthesize(text: string): Promise<Buffer> {
    const run = this.tail.then(() => this.runOne(text));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    await this.tail;
    const child = this.child;
    this.child = null;
    if (child && child.exitCode === null) {
      child.stdin.end();
      child.kill();
    }
    if (this.tmpDir) {
      await fs.rm(this.tmpDir, { recursive: true, force: true });
      this.tmpDir = null;
    }
  }

  private async runOne(text: string): Promise<Buffer> {
    const dir = await this.ensureTmpDir();
    const child = await this.ensureStarted();
    const outputFile = path.join(dir, `piper_${randomUUID().slice(0, 8)}.wav`);
    const started = Date.now();

    try {
      const written = await new Promise<string>((resolve, reject) => {
        if (this.child !== child) {
          reject(this.exitError ?? new Error('piper exited before the request was sent'));
          return;
        }
        const timer = setTimeout(() => {
          logger.warn({ timeoutMs: this.opts.timeoutMs }, 'piper timed out, killing process');
          child.kill('SIGKILL');
        }, this.opts.timeoutMs);

        this.pending = {
          resolve: (file) => {
            clearTimeout(timer);
            resolve(file);
          },
          reject: (err) => {
            clearTimeout(timer);
            reject(err);
          }
        };

        // one request per line; newlines inside the text would split it
        const line = JSON.stringify({ text: text.replace(/\s*\n\s*/g, ' '), output_file: outputFile });
        child.stdin.write(`${line}\n`);
      });

      const wav = await fs.readFile(written.trim() || outputFile);
      logger.debug({ elapsedMs: Date.now() - started, bytes: wav.length }, 'piper synthesized');
      return wav;
    } finally {
      this.pending = null;
      await fs.rm(outputFile, { force: true });
    }
  }

  private async ensureStarted(): Promise<ChildProcessWithoutNullStreams> {
    if (this.child && this.child.exitCode === null) {
      return this.child;
    }

    const args = [
      '--model',
      this.opts.modelPath,
      '--config',
      this.opts.configPath,
      '--json-input',
      ...this.opts.args
    ];
    logger.info({ model: path.basename(this.opts.modelPath) }, 'Loading piper model');

    const child = spawn(this.opts.binPath, args);
    this.stderr = '';
    this.exitError = null;

    child.stdin.on('error', (err) => {
      logger.warn({ error: err.message }, 'piper stdin closed');
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (d: string) => {
      // keep the tail for error reports
      this.stderr = (this.stderr + d).slice(-2000);
    });

    createInterface({ input: child.stdout }).on('line', (line) => {
      this.pending?.resolve(line);
    });

    child.on('error', (err) => {
      if (this.child === child) this.child = null;
      const error = new Error(`piper could not be started: ${err.message}`);
      this.exitError = this.exitError ?? error;
      this.pending?.reject(error);
    });

    child.on('close', (code, signal) => {
      if (this.child === child) this.child = null;
      const detail = this.stderr.trim().split('\n').slice(-3).join(' | ');
      const error = new Error(`piper exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})${detail ? `: ${detail}` : ''}`);
      this.exitError = this.exitError ?? error;
      this.pending?.reject(error);
    });

    this.child = child;
    return child;
  }

  private async ensureTmpDir(): Promise<string> {
    if (!this.tmpDir) {
      this.tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'voicepack-piper-'));
    }
    return this.tmpDir;
  }
}
