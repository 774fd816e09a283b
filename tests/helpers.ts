import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { HttpFetch, HttpRequest, HttpResponse } from '../src/http';
import { LogEntry, setLogHandler } from '../src/logger';

export interface RecordedCall {
  url: string;
  init?: HttpRequest;
}

export function textResponse(status: number, text: string, headers: Record<string, string> = {}): HttpResponse {
  const lowered = new Map(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name: string) => lowered.get(name.toLowerCase()) ?? null },
    json: async () => JSON.parse(text),
    text: async () => text,
  };
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): HttpResponse {
  return textResponse(status, JSON.stringify(body), { 'content-type': 'application/json', ...headers });
}

/** OpenAI chat-completions reply carrying `content`. */
export function openAiReply(content: string): HttpResponse {
  return jsonResponse(200, { choices: [{ message: { role: 'assistant', content } }] });
}

type ScriptStep = HttpResponse | Error | ((url: string, init?: HttpRequest) => HttpResponse | Promise<HttpResponse>);

/**
 * A fetch that answers from `steps` in order and records every call.
 * Once the script runs out the last step repeats.
 */
export function scriptedFetch(steps: ScriptStep[]): { fetch: HttpFetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetch: HttpFetch = async (url, init) => {
    calls.push({ url, init });
    const step = steps[Math.min(calls.length - 1, steps.length - 1)];
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(url, init);
    return step;
  };
  return { fetch, calls };
}

/** Parse the JSON body a fake fetch received. */
export function requestJson(call: RecordedCall | undefined): unknown {
  const body = call?.init?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export interface GatedFetch {
  fetch: HttpFetch;
  /** Calls currently held. */
  waiting(): number;
  /** Most calls in flight at once. */
  peak(): number;
  releaseAll(): void;
}

/** A fetch that holds every call until releaseAll(). */
export function gatedFetch(reply: () => HttpResponse): GatedFetch {
  const gates: Array<() => void> = [];
  let inFlight = 0;
  let peak = 0;
  const fetch: HttpFetch = async () => {
    inFlight++;
    peak = Math.max(peak, inFlight);
    try {
      await new Promise<void>((resolve) => gates.push(resolve));
      return reply();
    } finally {
      inFlight--;
    }
  };
  return {
    fetch,
    waiting: () => gates.length,
    peak: () => peak,
    releaseAll: () => {
      for (const open of gates.splice(0)) open();
    },
  };
}

/** Keep releasing held calls until `work` settles. */
export async function drain<T>(work: Promise<T>, gate: GatedFetch): Promise<T> {
  for (;;) {
    gate.releaseAll();
    const settled = await Promise.race([
      work.then(() => true),
      new Promise<boolean>((resolve) => setTimeout(() => resolve(false), 5)),
    ]);
    if (settled) return work;
  }
}

export const noSleep = async (_ms: number): Promise<void> => undefined;

/** Fixed jitter source: computeBackoff returns the un-jittered delay. */
export const midRandom = (): number => 0.5;

export async function makeTempDir(prefix = 'lab-intake-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Write a frame for StillImageDriver to serve. */
export async function writeSourceImage(dir: string, name = 'item.png', bytes = Buffer.from('fake-png-bytes')): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const file = path.join(dir, name);
  await fs.writeFile(file, bytes);
  return file;
}

/** Route log output into an array for the duration of a test. */
export function collectLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return entries;
}

/** Resolve once `predicate` holds, polling the event loop. */
export async function waitFor(predicate: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) throw new Error('Timed out waiting for condition');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
