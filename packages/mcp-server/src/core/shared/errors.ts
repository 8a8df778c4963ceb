/**
 * Error taxonomy for vault operations.
 *
 * Every blocking failure is a VaultError subclass and is thrown before any
 * file is touched. Non-blocking findings are returned as ValidationWarning data.
 */

export type VaultErrorCode =
  | 'vault_not_configured'
  | 'note_not_found'
  | 'section_not_found'
  | 'text_not_found'
  | 'note_already_exists'
  | 'invalid_argument'
  | 'invalid_name'
  | 'invalid_heading'
  | 'invalid_tag'
  | 'broken_link';

export class VaultError extends Error {
  readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class VaultNotConfiguredError extends VaultError {
  constructor(message: string) {
    super('vault_not_configured', message);
  }
}

export class NoteNotFoundError extends VaultError {
  constructor(readonly noteName: string) {
    super('note_not_found', `Note '${noteName}' not found`);
  }
}

export class SectionNotFoundError extends VaultError {
  constructor(readonly section: string, readonly noteName: string) {
    super('section_not_found', `Section '${section}' not found in note '${noteName}'`);
  }
}

export class TextNotFoundError extends VaultError {
  constructor(readonly text: string, readonly noteName: string, kind: 'Text' | 'Pattern' = 'Text') {
    super('text_not_found', `${kind} '${text}' not found in note '${noteName}'`);
  }
}

export class NoteAlreadyExistsError extends VaultError {
  constructor(readonly noteName: string) {
    super('note_already_exists', `Note '${noteName}' already exists`);
  }
}

export class InvalidArgumentError extends VaultError {
  constructor(message: string) {
    super('invalid_argument', message);
  }
}

export class InvalidNameError extends VaultError {
  constructor(message: string) {
    super('invalid_name', message);
  }
}

export class InvalidHeadingError extends VaultError {
  constructor(message: string) {
    super('invalid_heading', message);
  }
}

export class InvalidTagError extends VaultError {
  constructor(message: string) {
    super('invalid_tag', message);
  }
}

export class BrokenLinkError extends VaultError {
  constructor(readonly target: string, readonly section: string) {
    super('broken_link', `Section '${section}' not found in note '${target}'`);
  }
}

export function isVaultError(err: unknown): err is VaultError {
  return err instanceof VaultError;
}
