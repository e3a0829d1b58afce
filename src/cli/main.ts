#!/usr/bin/env node
import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';
import { openApp, type AppContext } from '../app';
import { ConfigError, loadConfig, type Config } from '../config';
import { isFinanceError } from '../domain/errors';
import { Menu, type Io } from './menu';

/** stdout proxy that can hide what readline echoes while a password is typed. */
class MutableOutput extends Writable {
  muted = false;

  override _write(chunk: Buffer | string, _enc: BufferEncoding, cb: (error?: Error | null) => void): void {
    if (!this.muted) process.stdout.write(chunk);
    cb();
  }
}

function terminalIo(): { io: Io; close(): void } {
  const output = new MutableOutput();
  const rl = createInterface({
    input: process.stdin,
    output,
    prompt: '',
    terminal: process.stdin.isTTY === true,
  });
  const lines = rl[Symbol.asyncIterator]();

  const next = async (): Promise<string | null> => {
    const r = await lines.next();
    return r.done ? null : r.value;
  };

  const io: Io = {
    async ask(question) {
      process.stdout.write(question);
      return next();
    },
    async askSecret(question) {
      process.stdout.write(question);
      output.muted = true;
      try {
        return await next();
      } finally {
        output.muted = false;
        process.stdout.write('\n');
      }
    },
    print(line = '') {
      process.stdout.write(line + '\n');
    },
  };
  return { io, close: () => rl.close() };
}

async function main(): Promise<number> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }

  let app: AppContext;
  try {
    app = openApp(config.dbPath);
  } catch (e) {
    console.error(isFinanceError(e) ? e.message : e);
    return 1;
  }

  const { io, close } = terminalIo();
  try {
    await new Menu(app, io, { backupDir: config.backupDir, debug: config.debug }).run();
  } finally {
    close();
    app.store.close();
  }
  return 0;
}

main().then(
  (code) => { process.exitCode = code; },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  },
);
