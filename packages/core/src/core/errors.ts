// ── Error codes ─────────────────────────────────────────────────────

export type LookformErrorCode =
  | 'NAME_COLLISION'
  | 'HIERARCHY_CONSISTENCY'
  | 'INVALID_CONFIG'
  | 'INVALID_ARTIFACT';

// ── LookformError ───────────────────────────────────────────────────

export class LookformError extends Error {
  readonly code: LookformErrorCode;

  constructor(code: LookformErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ── Naming ──────────────────────────────────────────────────────────

/**
 * Raised when a field name is still taken after its one `_conflict` rename.
 * Fatal for the document being compiled.
 */
export class NameCollisionError extends LookformError {
  readonly candidate: string;
  readonly renamed: string;

  constructor(candidate: string, renamed: string) {
    super(
      'NAME_COLLISION',
      `Cannot name field '${candidate}': both '${candidate}' and '${renamed}' are already taken`,
    );
    this.candidate = candidate;
    this.renamed = renamed;
  }
}

// ── Hierarchy ───────────────────────────────────────────────────────

/**
 * The hierarchy and the join chain disagree about which nodes are repeated
 * groups. Never caused by input data.
 */
export class HierarchyConsistencyError extends LookformError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('HIERARCHY_CONSISTENCY', `Repeated group '${path}': ${message}`);
    this.path = path;
  }
}

// ── Configuration ───────────────────────────────────────────────────

export class ConfigError extends LookformError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}
