/**
 * Serial Backend
 * Talks SCPI to a real instrument over a serial port
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Backend, SleepFn } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { DEFAULT_TIMEOUT_MS, sleep as defaultSleep } from '../types.js';

export interface SerialConfig {
  path: string;
  baudRate: number;
  commandDelay?: number;  // ms delay between commands (default: 50)
  timeoutMs?: number;     // query timeout in ms (default: 5000)
  terminator?: string;    // line terminator (default: "\n")
  sleep?: SleepFn;
}

export interface SerialBackend extends Backend {
  isOpen(): boolean;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export function createSerialBackend(config: SerialConfig): SerialBackend {
  const { path, baudRate, commandDelay = 50, terminator = '\n' } = config;
  const delay = config.sleep ?? defaultSleep;
  let timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let port: SerialPort | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: Error | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function send(target: SerialPort, command: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      target.write(command + terminator, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Wait for the next line; cancel() detaches without settling */
  function nextLine(lines: ReadlineParser, command: string, waitMs: number): { line: Promise<string>; cancel(): void } {
    let cancel: () => void = () => {};
    const line = new Promise<string>((resolve, reject) => {
      const onData = (data: string) => {
        cancel();
        resolve(data.trim());
      };

      const timeoutId = setTimeout(() => {
        cancel();
        reject(new Error(`Timeout waiting for response to: ${command}`));
      }, waitMs);

      cancel = () => {
        clearTimeout(timeoutId);
        lines.removeListener('data', onData);
      };

      lines.once('data', onData);
    });
    return { line, cancel };
  }

  function ready(): Result<{ port: SerialPort; parser: ReadlineParser }, Error> {
    if (disconnected) {
      return Err(disconnectError || new Error('SERIAL_PORT_DISCONNECTED'));
    }
    if (!port || !parser) {
      return Err(new Error('Port not opened'));
    }
    return Ok({ port, parser });
  }

  async function query(command: string, queryDelay?: number): Promise<Result<string, Error>> {
    return withLock(async () => {
      const io = ready();
      if (!io.ok) return io;

      const settle = queryDelay !== undefined && queryDelay > 0 ? queryDelay * 1000 : 0;
      const pending = nextLine(io.value.parser, command, timeoutMs + settle);

      let result: string;
      try {
        await send(io.value.port, command);
        // Give the instrument time to settle between write and read
        if (settle > 0) await delay(settle);
        result = await pending.line;
      } catch (e) {
        pending.cancel();
        return Err(toError(e));
      }

      await delay(commandDelay);
      return Ok(result);
    });
  }

  async function close(): Promise<Result<void, Error>> {
    if (!port) return Ok(undefined);

    // Acquire lock to wait for any in-flight operations
    await withLock(async () => {
      parser?.removeAllListeners();
      const current = port;
      current?.removeAllListeners();

      if (opened && !disconnected && current) {
        await new Promise<void>((resolve) => {
          current.close(() => resolve());
        });
      }

      port = null;
      parser = null;
      opened = false;
      disconnected = false;
      disconnectError = null;
    });
    console.log(`[Serial] Closed ${path}`);
    return Ok(undefined);
  }

  return {
    async connect(): Promise<Result<void, Error>> {
      if (opened) return Ok(undefined);

      const created = new SerialPort({ path, baudRate, autoOpen: false });

      // Listen for port disconnection events
      created.on('close', () => {
        disconnected = true;
        disconnectError = new Error('SERIAL_PORT_DISCONNECTED: Port closed');
        opened = false;
      });

      created.on('error', (err: Error) => {
        disconnected = true;
        disconnectError = new Error(`SERIAL_PORT_ERROR: ${err.message}`);
      });

      port = created;
      parser = created.pipe(new ReadlineParser({ delimiter: terminator }));

      try {
        await new Promise<void>((resolve, reject) => {
          created.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        created.removeAllListeners();
        port = null;
        parser = null;
        return Err(toError(e));
      }

      opened = true;
      disconnected = false;
      disconnectError = null;
      console.log(`[Serial] Opened ${path} at ${baudRate} baud`);
      return Ok(undefined);
    },

    disconnect: close,

    async write(command: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        const io = ready();
        if (!io.ok) return io;

        try {
          await send(io.value.port, command);
        } catch (e) {
          return Err(toError(e));
        }

        // Add delay after write for device to process
        await delay(commandDelay);
        return Ok(undefined);
      });
    },

    query,

    async queryRaw(command: string, queryDelay?: number): Promise<Result<Buffer, Error>> {
      const result = await query(command, queryDelay);
      return result.ok ? Ok(Buffer.from(result.value, 'utf-8')) : result;
    },

    close,

    async setTimeout(ms: number): Promise<Result<void, Error>> {
      if (ms <= 0) {
        return Err(new Error(`Timeout must be positive, got ${ms}ms`));
      }
      timeoutMs = ms;
      return Ok(undefined);
    },

    async getTimeout(): Promise<number> {
      return timeoutMs;
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

// Helper to list available serial ports
export async function listSerialPorts(): Promise<Array<{ path: string; manufacturer?: string }>> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
  }));
}
