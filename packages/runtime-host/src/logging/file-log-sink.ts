/**
 * nbimport Runtime Host — File-backed Import Log Sink
 *
 * Implements the LogSink interface from @nbimport/kernel by appending one
 * JSON line per import event to a log file. Each line is the event plus an
 * `event_id` ULID:
 *
 *   {"event_id":"01J...","kind":"import.start","timestamp":"...","module":"demo","path":"demo.ipynb"}
 *
 * The write is synchronous: the line is on disk before the import
 * continues. The parent directory is created on first append.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ImportEvent, LogSink } from '@nbimport/kernel';
import { ulid } from './ulid.js';

export class FileLogSink implements LogSink {
  private dirReady = false;

  constructor(readonly logPath: string) {}

  append(event: ImportEvent): void {
    if (!this.dirReady) {
      mkdirSync(dirname(this.logPath), { recursive: true });
      this.dirReady = true;
    }
    const line = JSON.stringify({ event_id: ulid(), ...event });
    appendFileSync(this.logPath, line + '\n', 'utf-8');
  }
}
