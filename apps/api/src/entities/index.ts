/**
 * Entity data layer
 *
 * Persists magazines, issues and numbering rules with stable generated IDs.
 * Missing-number computation itself lives in @repo/shared; this layer only
 * hands it a snapshot of a magazine's holdings.
 */

// Types
export type {
  Magazine,
  Issue,
  Numbering,
  EntityStore,
  CreateMagazineInput,
  CreateIssueInput,
  UpdateIssueInput,
  IssueFilter,
  CreateNumberingInput,
  UpdateNumberingInput,
} from './types.js';

// Errors
export {
  EntityNotFoundError,
  DuplicateMagazineError,
  DuplicateIssueError,
  type EntityKind,
} from './errors.js';

// Store operations
export {
  loadStore,
  saveStore,
  setDataDir,
  normalizeName,
  getMagazineById,
  getMagazineByName,
  getAllMagazines,
  getIssueById,
  getIssuesByMagazineId,
  getNumberingById,
  getNumberingsByMagazineId,
  getStoreStats,
  clearCache,
  type StoreStats,
} from './store.js';

// Magazine operations
export {
  createMagazine,
  findOrCreateMagazine,
  requireMagazine,
  getMagazineHoldings,
  getMissingNumbers,
  deleteCatalog,
} from './magazines.js';

// Issue operations
export {
  createIssue,
  updateIssue,
  deleteIssue,
  deleteNewIssues,
  listIssues,
} from './issues.js';

// Numbering operations
export {
  createNumbering,
  updateNumbering,
  deleteNumbering,
  listNumberings,
} from './numberings.js';
