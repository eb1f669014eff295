/**
 * Relationship Paths
 *
 * Structured addresses for every value a relationship stores, with a
 * dotted string form: `shared.affinity`, `a_to_b.warmth`,
 * `b_to_a.perceived_risk`, `a_to_b.trust.integrity`, `stage`.
 */

import { TrustPath } from '../trust/types';
import {
  Direction,
  DIRECTIONS,
  DIRECTION_NAMES,
  DirectionalDimension,
  DIRECTIONAL_DIMENSIONS,
  SharedPath,
  SHARED_PATHS,
} from './types';

export const PERCEIVED_RISK_PATH = 'perceived_risk';

export interface TrustFactorPath {
  trust: TrustPath;
}

/**
 * A value owned by one direction of the relationship
 */
export type DirectionalPath = DirectionalDimension | typeof PERCEIVED_RISK_PATH | TrustFactorPath;

export type RelPath =
  | { kind: 'shared'; path: SharedPath }
  | { kind: 'directional'; direction: Direction; path: DirectionalPath }
  | { kind: 'stage' };

const TRUST_PATHS: readonly TrustPath[] = [
  TrustPath.COMPETENCE,
  TrustPath.BENEVOLENCE,
  TrustPath.INTEGRITY,
  TrustPath.SUPPORT_WILLINGNESS,
];

/**
 * Unparseable relationship path
 */
export class RelPathError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid relationship path "${input}": ${reason}`);
    this.name = 'RelPathError';
    this.input = input;
  }
}

export function sharedPath(path: SharedPath): RelPath {
  return { kind: 'shared', path };
}

export function directionalPath(direction: Direction, path: DirectionalPath): RelPath {
  return { kind: 'directional', direction, path };
}

export function trustPath(direction: Direction, path: TrustPath): RelPath {
  return { kind: 'directional', direction, path: { trust: path } };
}

export const STAGE_PATH: RelPath = { kind: 'stage' };

export function isTrustFactorPath(path: DirectionalPath): path is TrustFactorPath {
  return typeof path === 'object';
}

function findMember<T extends string>(members: readonly T[], candidate: string): T | undefined {
  return members.find((member) => member === candidate);
}

/**
 * Parse the dotted string form of a path
 */
export function parseRelPath(input: string): RelPath {
  const segments = input.split('.');

  if (segments.length === 1 && segments[0] === 'stage') {
    return STAGE_PATH;
  }

  const [head, second, third] = segments;

  if (head === 'shared') {
    const shared = segments.length === 2 ? findMember(SHARED_PATHS, second) : undefined;
    if (!shared) {
      throw new RelPathError(input, 'unknown shared dimension');
    }
    return sharedPath(shared);
  }

  const direction = findMember(DIRECTIONS, head);
  if (!direction) {
    throw new RelPathError(input, 'expected "stage", "shared" or a direction');
  }

  if (segments.length === 2) {
    if (second === PERCEIVED_RISK_PATH) {
      return directionalPath(direction, PERCEIVED_RISK_PATH);
    }
    const dimension = findMember(DIRECTIONAL_DIMENSIONS, second);
    if (!dimension) {
      throw new RelPathError(input, 'unknown directional dimension');
    }
    return directionalPath(direction, dimension);
  }

  if (segments.length === 3 && second === 'trust') {
    const factor = findMember(TRUST_PATHS, third);
    if (!factor) {
      throw new RelPathError(input, 'unknown trust factor');
    }
    return trustPath(direction, factor);
  }

  throw new RelPathError(input, 'unexpected number of segments');
}

/**
 * Dotted string form of a path; inverse of parseRelPath
 */
export function formatRelPath(path: RelPath): string {
  switch (path.kind) {
    case 'stage':
      return 'stage';
    case 'shared':
      return `shared.${path.path}`;
    case 'directional':
      if (isTrustFactorPath(path.path)) {
        return `${path.direction}.trust.${path.path.trust}`;
      }
      return `${path.direction}.${path.path}`;
  }
}

function titleCase(name: string): string {
  return name
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Human readable form, e.g. "A to B.Warmth"
 */
export function describeRelPath(path: RelPath): string {
  switch (path.kind) {
    case 'stage':
      return 'Stage';
    case 'shared':
      return `Shared.${titleCase(path.path)}`;
    case 'directional': {
      const prefix = DIRECTION_NAMES[path.direction];
      if (isTrustFactorPath(path.path)) {
        return `${prefix}.Trust.${titleCase(path.path.trust)}`;
      }
      return `${prefix}.${titleCase(path.path)}`;
    }
  }
}
