export type EntityKind = 'magazine' | 'issue' | 'numbering';

export class EntityNotFoundError extends Error {
  constructor(
    public readonly entity: EntityKind,
    public readonly id: string
  ) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: ${id}`);
    this.name = 'EntityNotFoundError';
  }
}

export class DuplicateMagazineError extends Error {
  constructor(public readonly magazineName: string) {
    super(`Magazine already exists: "${magazineName}"`);
    this.name = 'DuplicateMagazineError';
  }
}

/**
 * The catalog already holds this (magazine, year, issue number).
 */
export class DuplicateIssueError extends Error {
  constructor(
    public readonly magazineId: string,
    public readonly year: number | null,
    public readonly issueNumber: string
  ) {
    super(
      `Issue "${issueNumber}"${year != null ? ` (${year})` : ''} already exists for magazine ${magazineId}`
    );
    this.name = 'DuplicateIssueError';
  }
}
