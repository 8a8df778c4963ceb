/**
 * Vault index - name -> Note map plus the reverse link graph.
 *
 * Built lazily on first access, dropped and rebuilt by refresh(). There is
 * no incremental update: every mutation ends with a full rescan.
 */

import * as fs from 'fs';
import { NoteNotFoundError, VaultNotConfiguredError } from '../shared/errors.js';
import { serverLog } from '../shared/serverLog.js';
import { parseNote } from './parser.js';
import type { Note } from './types.js';
import { scanVault } from './vault.js';

interface IndexState {
  notes: Map<string, Note>;           // name -> Note, scan order
  incoming: Map<string, string[]>;    // target -> unique sources, first-seen order
  builtAt: Date;
}

export class VaultIndex {
  private state: IndexState | null = null;
  private building: Promise<IndexState> | null = null;

  private constructor(readonly root: string) {}

  /**
   * Bind an index to a vault directory. Nothing is scanned until first use.
   */
  static async open(root: string): Promise<VaultIndex> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(root);
    } catch {
      throw new VaultNotConfiguredError(`Vault path does not exist: ${root}`);
    }
    if (!stats.isDirectory()) {
      throw new VaultNotConfiguredError(`Vault path is not a directory: ${root}`);
    }
    return new VaultIndex(root);
  }

  private async build(): Promise<IndexState> {
    const startTime = Date.now();
    const files = await scanVault(this.root);
    const notes = new Map<string, Note>();

    for (const file of files) {
      const note = await parseNote(file);
      const existing = notes.get(note.name);
      if (existing) {
        serverLog('index', `Duplicate note name '${note.name}': ${note.relativePath} replaces ${existing.relativePath}`, 'warn');
      }
      notes.set(note.name, note);
    }

    const incoming = new Map<string, string[]>();
    for (const note of notes.values()) {
      for (const target of note.outgoingLinks) {
        const sources = incoming.get(target);
        if (!sources) {
          incoming.set(target, [note.name]);
        } else if (!sources.includes(note.name)) {
          sources.push(note.name);
        }
      }
    }

    serverLog('index', `Index built: ${notes.size} notes in ${Date.now() - startTime}ms`);
    return { notes, incoming, builtAt: new Date() };
  }

  private async ensure(): Promise<IndexState> {
    if (this.state) return this.state;
    if (!this.building) {
      this.building = this.build().finally(() => {
        this.building = null;
      });
    }
    this.state = await this.building;
    return this.state;
  }

  /** Drop the snapshot and rebuild it from disk */
  async refresh(): Promise<void> {
    this.state = null;
    await this.ensure();
  }

  async listNotes(): Promise<Note[]> {
    const { notes } = await this.ensure();
    return [...notes.values()];
  }

  /**
   * Look up a note. A miss triggers exactly one silent rescan; a second miss
   * is a genuine not-found.
   */
  async getNote(name: string): Promise<Note> {
    let note = (await this.ensure()).notes.get(name);
    if (!note) {
      await this.refresh();
      note = (await this.ensure()).notes.get(name);
    }
    if (!note) {
      throw new NoteNotFoundError(name);
    }
    return note;
  }

  /** Membership test against the current snapshot, no rescan */
  async hasNote(name: string): Promise<boolean> {
    return (await this.ensure()).notes.has(name);
  }

  async resolvePath(name: string): Promise<string> {
    return (await this.getNote(name)).path;
  }

  /** Names of notes linking to `name`; works for targets that do not exist */
  async getIncomingLinks(name: string): Promise<string[]> {
    const sources = (await this.ensure()).incoming.get(name);
    return sources ? [...sources] : [];
  }

  async getOutgoingLinks(name: string): Promise<string[]> {
    return [...(await this.getNote(name)).outgoingLinks];
  }

  async builtAt(): Promise<Date> {
    return (await this.ensure()).builtAt;
  }
}
