/**
 * Target framework identity and name resolution.
 */

export class TargetFramework {
  /** Sentinel for dependencies that are not specific to any target. */
  static readonly Any = new TargetFramework('any', 'any');

  readonly key: string;

  constructor(
    readonly fullName: string,
    readonly shortName: string
  ) {
    this.key = fullName.toLowerCase();
  }

  /**
   * Case-insensitive identity; a string matches either the full or the short name.
   */
  equals(other: TargetFramework | string | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }

    if (typeof other === 'string') {
      const candidate = other.toLowerCase();
      return candidate === this.key || candidate === this.shortName.toLowerCase();
    }

    return other.key === this.key;
  }

  toString(): string {
    return this.shortName;
  }
}

export interface TargetFrameworkProvider {
  /** Resolve a short (`net6.0`) or full (`.NETCoreApp,Version=v6.0`) name; null when unrecognised. */
  getTargetFramework(shortOrFullName: string | null | undefined): TargetFramework | null;
}

const FRAMEWORK_IDENTIFIERS = {
  framework: '.NETFramework',
  core: '.NETCoreApp',
  standard: '.NETStandard',
} as const;

const SHORT_NET_FRAMEWORK = /^net(\d)(\d)(\d)?$/;
const SHORT_NET = /^net(\d+)\.(\d+)(?:-([a-z]+[\d.]*))?$/;
const SHORT_NETCOREAPP = /^netcoreapp(\d+)\.(\d+)$/;
const SHORT_NETSTANDARD = /^netstandard(\d+)\.(\d+)$/;
const FULL_NAME = /^(\.netframework|\.netcoreapp|\.netstandard),version=v(\d+)\.(\d+)(?:\.(\d+))?(?:,platform=([a-z]+[\d.]*))?$/;

function withPlatform(fullName: string, platform: string | undefined): string {
  return platform ? `${fullName},Platform=${platform}` : fullName;
}

function coreShortName(major: number, minor: number, platform: string | undefined): string {
  const base = major >= 5 ? `net${major}.${minor}` : `netcoreapp${major}.${minor}`;
  return platform ? `${base}-${platform}` : base;
}

export function parseTargetFramework(name: string): TargetFramework | null {
  const normalized = name.trim().toLowerCase();
  if (normalized.length === 0) {
    return null;
  }

  if (normalized === TargetFramework.Any.key) {
    return TargetFramework.Any;
  }

  let match = SHORT_NET_FRAMEWORK.exec(normalized);
  if (match) {
    const [, major, minor, patch] = match;
    const version = patch ? `${major}.${minor}.${patch}` : `${major}.${minor}`;
    return new TargetFramework(`${FRAMEWORK_IDENTIFIERS.framework},Version=v${version}`, normalized);
  }

  match = SHORT_NET.exec(normalized);
  if (match) {
    const [, major, minor, platform] = match;
    return new TargetFramework(
      withPlatform(`${FRAMEWORK_IDENTIFIERS.core},Version=v${major}.${minor}`, platform),
      normalized
    );
  }

  match = SHORT_NETCOREAPP.exec(normalized);
  if (match) {
    const [, major, minor] = match;
    return new TargetFramework(`${FRAMEWORK_IDENTIFIERS.core},Version=v${major}.${minor}`, normalized);
  }

  match = SHORT_NETSTANDARD.exec(normalized);
  if (match) {
    const [, major, minor] = match;
    return new TargetFramework(`${FRAMEWORK_IDENTIFIERS.standard},Version=v${major}.${minor}`, normalized);
  }

  match = FULL_NAME.exec(normalized);
  if (match) {
    const [, identifier, majorText, minorText, patch, platform] = match;
    const major = Number(majorText);
    const minor = Number(minorText);

    if (identifier === FRAMEWORK_IDENTIFIERS.framework.toLowerCase()) {
      const version = patch ? `${major}.${minor}.${patch}` : `${major}.${minor}`;
      return new TargetFramework(
        `${FRAMEWORK_IDENTIFIERS.framework},Version=v${version}`,
        `net${major}${minor}${patch ?? ''}`
      );
    }

    if (identifier === FRAMEWORK_IDENTIFIERS.standard.toLowerCase()) {
      return new TargetFramework(
        `${FRAMEWORK_IDENTIFIERS.standard},Version=v${major}.${minor}`,
        `netstandard${major}.${minor}`
      );
    }

    return new TargetFramework(
      withPlatform(`${FRAMEWORK_IDENTIFIERS.core},Version=v${major}.${minor}`, platform),
      coreShortName(major, minor, platform)
    );
  }

  return null;
}

/**
 * Resolves names through `parseTargetFramework`, reusing the instance created
 * for each distinct spelling.
 */
export class DefaultTargetFrameworkProvider implements TargetFrameworkProvider {
  private readonly cache = new Map<string, TargetFramework | null>();

  getTargetFramework(shortOrFullName: string | null | undefined): TargetFramework | null {
    if (!shortOrFullName) {
      return null;
    }

    const cacheKey = shortOrFullName.trim().toLowerCase();
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const parsed = parseTargetFramework(shortOrFullName);
    this.cache.set(cacheKey, parsed);
    return parsed;
  }
}
