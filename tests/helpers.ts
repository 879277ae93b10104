/**
 * Shared test fixtures: temp directories, a recording logger and an
 * in-process asset transport.
 */

import type { Application } from 'express';
import { mkdtemp, mkdir, writeFile } from 'fs/promises';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { LogEntry, LogLevel, Logger } from '../src/logger';
import { AssetSource, AssetTransport, TransportError } from '../src/transfer/asset-transport';
import { removeTree } from '../src/workspace/fs-utils';
import { FileSystemTemplateStore } from '../src/workspace/template-store';

export async function makeTempDir(prefix = 'draftpack-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await removeTree(dir);
}

/** A Logger that keeps entries in memory instead of printing them. */
export function recordingLogger(
  entries: LogEntry[] = [],
  base: Record<string, unknown> = {},
): { logger: Logger; entries: LogEntry[] } {
  const push = (level: LogLevel) => (message: string, context?: Record<string, unknown>) => {
    entries.push({ level, message, context: { ...base, ...context }, timestamp: new Date().toISOString() });
  };
  const logger: Logger = {
    debug: push(LogLevel.Debug),
    info: push(LogLevel.Info),
    warn: push(LogLevel.Warn),
    error: push(LogLevel.Error),
    child: (context) => recordingLogger(entries, { ...base, ...context }).logger,
  };
  return { logger, entries };
}

/**
 * Write the two standard templates under `<root>/templates` and return a
 * store over them.
 */
export async function writeTemplates(root: string): Promise<FileSystemTemplateStore> {
  const templateRoot = path.join(root, 'templates');
  await mkdir(path.join(templateRoot, 'template', 'materials'), { recursive: true });
  await writeFile(path.join(templateRoot, 'template', 'draft_content.json'), '{"tracks":[]}');
  await writeFile(path.join(templateRoot, 'template', 'materials', 'README.txt'), 'placeholder');
  await mkdir(path.join(templateRoot, 'template_capcut'), { recursive: true });
  await writeFile(path.join(templateRoot, 'template_capcut', 'draft_info.json'), '{"tracks":[]}');
  return new FileSystemTemplateStore(templateRoot);
}

/** How the fake transport answers one open() call. */
export type FakeResponse =
  | { body: Buffer | string; contentLength?: number }
  | { error: TransportError }
  | { hang: true };

export type FakeBehavior = FakeResponse | ((attempt: number) => FakeResponse);

/** Serves canned bodies and failures by locator, in process. */
export class FakeTransport implements AssetTransport {
  readonly calls: string[] = [];
  private attempts = new Map<string, number>();
  private waiters: { count: number; resolve: () => void }[] = [];

  constructor(private behaviors: Record<string, FakeBehavior>) {}

  attemptsFor(locator: string): number {
    return this.attempts.get(locator) ?? 0;
  }

  /** Resolves once open() has been called at least `count` times. */
  waitForCalls(count: number): Promise<void> {
    if (this.calls.length >= count) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push({ count, resolve }));
  }

  open(locator: string, signal: AbortSignal): Promise<AssetSource> {
    this.calls.push(locator);
    const attempt = this.attemptsFor(locator) + 1;
    this.attempts.set(locator, attempt);
    this.waiters = this.waiters.filter((w) => {
      if (this.calls.length < w.count) return true;
      w.resolve();
      return false;
    });

    const behavior = this.behaviors[locator];
    if (!behavior) {
      return Promise.reject(new TransportError(`GET ${locator} returned HTTP 404`, false, 404));
    }
    const response = typeof behavior === 'function' ? behavior(attempt) : behavior;

    if ('error' in response) {
      return Promise.reject(response.error);
    }
    if ('hang' in response) {
      return new Promise((_resolve, reject) => {
        const onAbort = () => {
          const err = new Error('The operation was aborted');
          err.name = 'AbortError';
          reject(err);
        };
        if (signal.aborted) onAbort();
        else signal.addEventListener('abort', onAbort, { once: true });
      });
    }

    const bytes = typeof response.body === 'string' ? Buffer.from(response.body) : response.body;
    return Promise.resolve({
      stream: Readable.from([bytes]),
      contentLength: response.contentLength ?? bytes.length,
    });
  }
}

export interface TestResponse {
  status: number;
  body: Record<string, unknown>;
}

/** An app listening on a loopback port for the length of a test. */
export interface TestServer {
  request(method: string, path: string, body?: unknown, rawBody?: string): Promise<TestResponse>;
  close(): Promise<void>;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected a JSON object, got: ${JSON.stringify(value)}`);
  }
  return Object.fromEntries(Object.entries(value));
}

export async function startServer(app: Application): Promise<TestServer> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
  const base = `http://127.0.0.1:${address.port}`;

  return {
    async request(method, path, body, rawBody) {
      const init: RequestInit = { method, headers: { 'Content-Type': 'application/json' } };
      if (rawBody !== undefined) init.body = rawBody;
      else if (body !== undefined) init.body = JSON.stringify(body);
      const res = await fetch(`${base}${path}`, init);
      const json: unknown = await res.json();
      return { status: res.status, body: asRecord(json) };
    },
    close() {
      return new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    },
  };
}
