/**
 * Vault operations - every user-facing read and mutation.
 *
 * Mutations run one at a time: blocking checks first (nothing is written if
 * they throw), then the write, then a full index refresh, then post-write
 * warnings.
 */

import path from 'path';
import {
  BrokenLinkError,
  InvalidArgumentError,
  NoteAlreadyExistsError,
  NoteNotFoundError,
  SectionNotFoundError,
  TextNotFoundError,
} from '../shared/errors.js';
import { serverLog } from '../shared/serverLog.js';
import type { VaultIndex } from '../read/graph.js';
import { extractHeadings, findSectionBounds } from '../read/markdown.js';
import { extractTags } from '../read/parser.js';
import type {
  FrontMatter,
  Heading,
  LinkDirection,
  Note,
  SearchMode,
  SectionBounds,
  ValidationWarning,
} from '../read/types.js';
import { composeNote, decodeFrontMatter, encodeFrontMatter } from './frontmatter.js';
import { collectTags, matchesTagQuery, parseTagLogic, parseTagQuery, tagMatches, TagPolicy } from './tags.js';
import { Validator } from './validator.js';
import { rewriteWikilinks, scanSectionLinks } from './wikilinks.js';
import { fileExists, moveToTrash, readNoteFile, renameNoteFile, TRASH_DIR, writeNoteFile } from './writer.js';

export interface CreateResult {
  path: string;
  warnings: ValidationWarning[];
}

export interface WriteResult {
  warnings: ValidationWarning[];
}

export interface DeleteResult {
  name: string;
  trashPath: string;
  filesUpdated: string[];
}

export interface RenameResult {
  oldName: string;
  newName: string;
  filesUpdated: string[];
}

export interface SearchResult {
  name: string;
  path: string;
}

export interface LinksResult {
  name: string;
  outgoing: string[];
  incoming: string[];
}

export interface BrokenLink {
  source: string;
  target: string;
}

export interface ReplaceResult {
  name: string;
  replacements: number;
}

export interface InsertResult {
  name: string;
  position: 'before' | 'after';
  pattern: string;
}

export interface TagResult {
  name: string;
  tags: string[];
}

export interface NoteMetadata {
  name: string;
  frontMatter: FrontMatter;
  outgoing: string[];
  incoming: string[];
}

export interface NoteNamePage {
  names: string[];
  total: number;
  limit: number;
  offset: number;
}

export interface OperationsOptions {
  validator?: Validator;
  tagPolicy?: TagPolicy;
}

export class Operations {
  readonly validator: Validator;
  readonly tagPolicy: TagPolicy;

  constructor(readonly index: VaultIndex, options: OperationsOptions = {}) {
    this.validator = options.validator ?? new Validator();
    this.tagPolicy = options.tagPolicy ?? new TagPolicy();
  }

  // ========================================
  // Validation shared by body-writing operations
  // ========================================

  /**
   * Check every wikilink in `content`. A missing note is a warning (forward
   * references are allowed); a missing section of an existing note throws.
   * Targets resolve through getNote, so a note added on disk since the last
   * build is found by its rescan.
   */
  async validateWikilinks(content: string): Promise<ValidationWarning[]> {
    const warnings: ValidationWarning[] = [];

    for (const link of scanSectionLinks(content)) {
      let note: Note;
      try {
        note = await this.index.getNote(link.target);
      } catch (err) {
        if (!(err instanceof NoteNotFoundError)) throw err;
        warnings.push({
          line: link.line,
          message: `Link to non-existent note: ${link.target}`,
          rule: 'broken-link',
        });
        continue;
      }

      if (link.section !== null) {
        const headings = extractHeadings(note.body).map(h => h.text);
        if (!headings.includes(link.section)) {
          throw new BrokenLinkError(link.target, link.section);
        }
      }
    }

    return warnings;
  }

  /** Blocking checks on a new body; returns the link warnings */
  private async checkBody(body: string): Promise<ValidationWarning[]> {
    this.validator.validateHeadings(body);
    return this.validateWikilinks(body);
  }

  private async commit(fullPath: string, fileText: string, linkWarnings: ValidationWarning[]): Promise<ValidationWarning[]> {
    await writeNoteFile(fullPath, fileText);
    await this.index.refresh();
    return [...this.validator.validate(fileText), ...linkWarnings];
  }

  /** Write a new body under the note's existing front matter */
  private async writeBody(note: Note, body: string): Promise<void> {
    await writeNoteFile(note.path, composeNote(note.rawFrontMatter, body));
    await this.index.refresh();
  }

  // ========================================
  // CRUD
  // ========================================

  async create(name: string, content: string = '', frontMatter?: FrontMatter): Promise<CreateResult> {
    this.validator.validateName(name);
    const linkWarnings = await this.checkBody(content);

    const fullPath = path.join(this.index.root, `${name}.md`);
    if ((await fileExists(fullPath)) || (await this.index.hasNote(name))) {
      throw new NoteAlreadyExistsError(name);
    }

    const fileText = encodeFrontMatter(frontMatter ?? {}, content);
    const warnings = await this.commit(fullPath, fileText, linkWarnings);
    serverLog('ops', `Created ${name}`);
    return { path: fullPath, warnings };
  }

  /**
   * Create after checking front-matter tags against the allowed list and
   * the tag rules
   */
  async createWithPolicy(name: string, content: string = '', frontMatter?: FrontMatter): Promise<CreateResult> {
    if (frontMatter && 'tags' in frontMatter) {
      const tags = extractTags(frontMatter);
      this.tagPolicy.checkAllowed(tags, await this.collectTags());
      this.tagPolicy.checkRules(tags, name, frontMatter);
    }
    return this.create(name, content, frontMatter);
  }

  /** Full file text: front matter and body */
  async read(name: string): Promise<string> {
    return readNoteFile(await this.index.resolvePath(name));
  }

  async append(name: string, text: string): Promise<WriteResult> {
    const fullPath = await this.index.resolvePath(name);
    const fileText = `${await readNoteFile(fullPath)}\n\n${text}`;

    const linkWarnings = await this.checkBody(decodeFrontMatter(fileText).body);
    const warnings = await this.commit(fullPath, fileText, linkWarnings);
    serverLog('ops', `Appended to ${name}`);
    return { warnings };
  }

  /** Replace the body; front matter is kept byte-for-byte */
  async update(name: string, content: string): Promise<WriteResult> {
    const note = await this.index.getNote(name);
    const linkWarnings = await this.checkBody(content);

    const warnings = await this.commit(note.path, composeNote(note.rawFrontMatter, content), linkWarnings);
    serverLog('ops', `Updated ${name}`);
    return { warnings };
  }

  async delete(name: string, dryRun: boolean = false): Promise<DeleteResult> {
    const note = await this.index.getNote(name);
    const filesUpdated = await this.index.getIncomingLinks(name);

    if (dryRun) {
      return {
        name,
        trashPath: path.join(this.index.root, TRASH_DIR, `${name}.md`),
        filesUpdated,
      };
    }

    await this.rewriteReferences(filesUpdated, name, `${name} (deleted)`);
    const trashPath = await moveToTrash(this.index.root, note.path);
    await this.index.refresh();

    serverLog('ops', `Deleted ${name} (${filesUpdated.length} referring notes updated)`);
    return { name, trashPath, filesUpdated };
  }

  async rename(oldName: string, newName: string, dryRun: boolean = false): Promise<RenameResult> {
    this.validator.validateName(newName);
    const note = await this.index.getNote(oldName);

    const newPath = path.join(path.dirname(note.path), `${newName}.md`);
    if ((await this.index.hasNote(newName)) || (await fileExists(newPath))) {
      throw new NoteAlreadyExistsError(newName);
    }

    const filesUpdated = await this.index.getIncomingLinks(oldName);

    if (!dryRun) {
      await this.rewriteReferences(filesUpdated, oldName, newName);
      await renameNoteFile(note.path, newPath);
      await this.index.refresh();
      serverLog('ops', `Renamed ${oldName} -> ${newName} (${filesUpdated.length} referring notes updated)`);
    }

    return { oldName, newName, filesUpdated };
  }

  /** Apply the link rewrite in each referring note; untouched files are not written */
  private async rewriteReferences(sources: string[], oldName: string, newName: string): Promise<void> {
    for (const source of sources) {
      const ref = await this.index.getNote(source);
      const text = await readNoteFile(ref.path);
      const { content, count } = rewriteWikilinks(text, oldName, newName);
      if (count > 0) {
        await writeNoteFile(ref.path, content);
      }
    }
  }

  async batchRename(renames: Record<string, string>, dryRun: boolean = false): Promise<RenameResult[]> {
    const results: RenameResult[] = [];
    for (const [oldName, newName] of Object.entries(renames)) {
      results.push(await this.rename(oldName, newName, dryRun));
    }
    return results;
  }

  async batchDelete(names: string[], dryRun: boolean = false): Promise<DeleteResult[]> {
    const results: DeleteResult[] = [];
    for (const name of names) {
      results.push(await this.delete(name, dryRun));
    }
    return results;
  }

  // ========================================
  // Front matter and tags
  // ========================================

  async frontmatterGet(name: string): Promise<FrontMatter> {
    return { ...(await this.index.getNote(name)).frontMatter };
  }

  async frontmatterSet(name: string, key: string, value: unknown): Promise<void> {
    const note = await this.index.getNote(name);
    const frontMatter: FrontMatter = { ...note.frontMatter, [key]: value };

    await writeNoteFile(note.path, encodeFrontMatter(frontMatter, note.body));
    await this.index.refresh();
    serverLog('ops', `Set frontmatter ${key} on ${name}`);
  }

  /** frontmatterSet with the tag list checked against the vault's tags */
  async frontmatterSetWithPolicy(name: string, key: string, value: unknown): Promise<void> {
    if (key === 'tags') {
      if (!Array.isArray(value)) {
        throw new InvalidArgumentError(`tags must be a JSON list, e.g. '["tag1", "tag2"]'`);
      }
      this.tagPolicy.checkAllowed(value.map(v => String(v)), await this.collectTags());
    }
    await this.frontmatterSet(name, key, value);
  }

  async addTag(name: string, tag: string): Promise<TagResult & { added: boolean }> {
    const note = await this.index.getNote(name);
    if (note.tags.includes(tag)) {
      return { name, tags: [...note.tags], added: false };
    }

    this.tagPolicy.checkAllowed([tag], await this.collectTags());
    this.tagPolicy.checkRules([tag], name, note.frontMatter);

    const tags = [...note.tags, tag];
    await this.frontmatterSet(name, 'tags', tags);
    return { name, tags, added: true };
  }

  /** Idempotent: removing an absent tag writes nothing */
  async removeTag(name: string, tag: string): Promise<TagResult & { removed: boolean }> {
    const note = await this.index.getNote(name);
    const removed = note.tags.includes(tag);
    const tags = note.tags.filter(t => t !== tag);

    if (removed) {
      await this.frontmatterSet(name, 'tags', tags);
    }
    return { name, tags, removed };
  }

  async collectTags(): Promise<string[]> {
    return collectTags(await this.index.listNotes());
  }

  // ========================================
  // Search and links
  // ========================================

  async search(query: string, mode: SearchMode): Promise<SearchResult[]> {
    const needle = query.toLowerCase();
    const matchers: Record<SearchMode, (note: Note) => boolean> = {
      name: note => note.name === query,
      name_partial: note => note.name.toLowerCase().includes(needle),
      content: note => note.body.toLowerCase().includes(needle),
      tag: note => tagMatches(note.tags, query),
    };

    const matches = matchers[mode];
    return (await this.index.listNotes())
      .filter(matches)
      .map(note => ({ name: note.name, path: note.path }));
  }

  /** Comma-separated tag query combined with "and" / "or" */
  async searchByTags(query: string, logic: string = 'or'): Promise<SearchResult[]> {
    const tagLogic = parseTagLogic(logic);
    const queries = parseTagQuery(query);

    return (await this.index.listNotes())
      .filter(note => matchesTagQuery(note.tags, queries, tagLogic))
      .map(note => ({ name: note.name, path: note.path }));
  }

  async links(name: string, direction: LinkDirection): Promise<LinksResult> {
    await this.index.getNote(name);

    const outgoing = direction === 'in' ? [] : await this.index.getOutgoingLinks(name);
    const incoming = direction === 'out' ? [] : await this.index.getIncomingLinks(name);
    return { name, outgoing, incoming };
  }

  async findBrokenLinks(): Promise<BrokenLink[]> {
    const notes = await this.index.listNotes();
    const existing = new Set(notes.map(n => n.name));
    const broken: BrokenLink[] = [];

    for (const note of notes) {
      for (const target of note.outgoingLinks) {
        if (!existing.has(target)) {
          broken.push({ source: note.name, target });
        }
      }
    }
    return broken;
  }

  async metadata(name: string): Promise<NoteMetadata> {
    const frontMatter = await this.frontmatterGet(name);
    const { outgoing, incoming } = await this.links(name, 'both');
    return { name, frontMatter, outgoing, incoming };
  }

  async listNoteNames(options: { limit?: number; offset?: number } = {}): Promise<NoteNamePage> {
    const { limit = 100, offset = 0 } = options;
    const names = (await this.index.listNotes()).map(n => n.name).sort();
    return {
      names: names.slice(offset, offset + limit),
      total: names.length,
      limit,
      offset,
    };
  }

  // ========================================
  // Sections
  // ========================================

  private async locateSection(name: string, section: string): Promise<{ note: Note; lines: string[]; bounds: SectionBounds }> {
    const note = await this.index.getNote(name);
    const lines = note.body.split('\n');
    const bounds = findSectionBounds(lines, section);
    if (!bounds) {
      throw new SectionNotFoundError(section, name);
    }
    return { note, lines, bounds };
  }

  async getHeadings(name: string): Promise<Heading[]> {
    return extractHeadings((await this.index.getNote(name)).body);
  }

  /** Section text without its heading line, trimmed */
  async readSection(name: string, section: string): Promise<string> {
    const { lines, bounds } = await this.locateSection(name, section);
    return lines.slice(bounds.start, bounds.end).join('\n').trim();
  }

  async appendSection(name: string, section: string, text: string): Promise<WriteResult> {
    const { note, lines, bounds } = await this.locateSection(name, section);
    const body = [...lines.slice(0, bounds.end), text, ...lines.slice(bounds.end)].join('\n');

    const linkWarnings = await this.checkBody(body);
    const warnings = await this.commit(note.path, composeNote(note.rawFrontMatter, body), linkWarnings);
    serverLog('ops', `Appended to section '${section}' in ${name}`);
    return { warnings };
  }

  /** Replace everything under the heading; the heading line stays */
  async updateSection(name: string, section: string, content: string): Promise<WriteResult> {
    const { note, lines, bounds } = await this.locateSection(name, section);
    const heading = lines[bounds.start - 1];
    const body = [...lines.slice(0, bounds.start - 1), heading, content, ...lines.slice(bounds.end)].join('\n');

    const linkWarnings = await this.checkBody(body);
    const warnings = await this.commit(note.path, composeNote(note.rawFrontMatter, body), linkWarnings);
    serverLog('ops', `Updated section '${section}' in ${name}`);
    return { warnings };
  }

  async deleteSection(name: string, section: string): Promise<void> {
    const { note, lines, bounds } = await this.locateSection(name, section);
    const body = [...lines.slice(0, bounds.start - 1), ...lines.slice(bounds.end)].join('\n');

    await this.writeBody(note, body);
    serverLog('ops', `Deleted section '${section}' from ${name}`);
  }

  // ========================================
  // Text edits
  // ========================================

  async replace(name: string, oldText: string, newText: string, replaceAll: boolean = false): Promise<ReplaceResult> {
    if (oldText === '') {
      throw new InvalidArgumentError('old_text must not be empty');
    }

    const note = await this.index.getNote(name);
    if (!note.body.includes(oldText)) {
      throw new TextNotFoundError(oldText, name);
    }

    let body: string;
    let replacements: number;
    if (replaceAll) {
      const parts = note.body.split(oldText);
      replacements = parts.length - 1;
      body = parts.join(newText);
    } else {
      replacements = 1;
      body = note.body.replace(oldText, () => newText);
    }

    await this.writeBody(note, body);
    serverLog('ops', `Replaced ${replacements} occurrence(s) in ${name}`);
    return { name, replacements };
  }

  /**
   * Insert a line before or after the first line whose trimmed text equals
   * the trimmed pattern
   */
  async insert(name: string, text: string, anchor: { before?: string; after?: string }): Promise<InsertResult> {
    const { before, after } = anchor;
    if ((before === undefined) === (after === undefined)) {
      throw new InvalidArgumentError("Exactly one of 'before' or 'after' must be specified");
    }
    const position = before !== undefined ? 'before' : 'after';
    const pattern = before ?? after ?? '';

    const note = await this.index.getNote(name);
    const lines = note.body.split('\n');
    const index = lines.findIndex(line => line.trim() === pattern.trim());
    if (index === -1) {
      throw new TextNotFoundError(pattern, name, 'Pattern');
    }

    lines.splice(position === 'before' ? index : index + 1, 0, text);
    await this.writeBody(note, lines.join('\n'));
    serverLog('ops', `Inserted text ${position} '${pattern}' in ${name}`);
    return { name, position, pattern };
  }
}
