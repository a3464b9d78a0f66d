export type OrganizeErrorCode =
  | 'IDENTITY_MISSING'
  | 'TAG_READ_FAILURE'
  | 'INVALID_DESTINATION'
  | 'SOURCE_UNAVAILABLE'
  | 'DESTINATION_COLLISION'
  | 'COPY_VERIFICATION_FAILED'
  | 'COPY_FAILED'
  | 'DISCOVERY_FAILED'
  | 'INVALID_FOLDER';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class OrganizeError extends Error {
  readonly code: OrganizeErrorCode;

  constructor(code: OrganizeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrganizeError';
    this.code = code;
  }
}

/**
 * Carries whatever was found before the scan gave up, so the error record
 * can show which half of the identity was missing.
 */
export class IdentityMissingError extends OrganizeError {
  readonly artistFound: string;
  readonly albumFound: string;

  constructor(artistFound: string, albumFound: string) {
    super('IDENTITY_MISSING', 'Artist or album data not found');
    this.name = 'IdentityMissingError';
    this.artistFound = artistFound;
    this.albumFound = albumFound;
  }
}

export class TagReadError extends OrganizeError {
  constructor(cause: unknown) {
    super('TAG_READ_FAILURE', `Failed to read tags: ${describeError(cause)}`, { cause });
    this.name = 'TagReadError';
  }
}

export class MoveError extends OrganizeError {
  constructor(
    code: 'SOURCE_UNAVAILABLE' | 'DESTINATION_COLLISION' | 'COPY_VERIFICATION_FAILED' | 'COPY_FAILED',
    detail: string,
    cause?: unknown
  ) {
    super(code, `Copy failed: ${detail}`, { cause });
    this.name = 'MoveError';
  }
}

export class DiscoveryError extends OrganizeError {
  constructor(root: string, cause: unknown) {
    super('DISCOVERY_FAILED', `Could not scan ${root}: ${describeError(cause)}`, { cause });
    this.name = 'DiscoveryError';
  }
}

export class InvalidFolderError extends OrganizeError {
  constructor(message: string) {
    super('INVALID_FOLDER', message);
    this.name = 'InvalidFolderError';
  }
}
