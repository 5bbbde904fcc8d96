// src/config/schema.ts

import { z } from 'zod';

/**
 * Package registries a server can be distributed through.
 * - mcpb: prebuilt bundle with per-platform binaries and checksums
 */
export const PACKAGE_TYPES = ['npm', 'pypi', 'mcpb', 'docker', 'nuget'] as const;
export type PackageType = (typeof PACKAGE_TYPES)[number];

/**
 * Transports a remote endpoint can be reached over
 */
export const TRANSPORTS = ['streamable-http', 'sse'] as const;
export type Transport = (typeof TRANSPORTS)[number];

/**
 * Result of classifying a raw enum value. Unrecognized values keep the raw
 * input so diagnostics can echo it back.
 */
export type Classified<T extends string> =
  | { kind: 'known'; value: T }
  | { kind: 'unknown'; raw: unknown };

export interface RepositoryInfo {
  type?: string;                  // e.g. 'git'
  url?: string;
}

export interface PlatformEntry {
  os?: string;                    // darwin, linux, windows
  arch?: string;                  // amd64, arm64
  uri?: string;                   // Download location of the platform binary
  sha256?: string;
}

export interface PackageEntry {
  type?: string;                  // One of PACKAGE_TYPES, unknown values are tolerated
  uri?: string;                   // Required for mcpb
  sha256?: string;                // Required for mcpb
  platforms?: PlatformEntry[];    // Required (non-empty) for mcpb
}

export interface RemoteEntry {
  endpoint?: string;
  transport?: string;             // One of TRANSPORTS, unknown values are tolerated
}

/**
 * Shape of a server.json manifest. Every field is optional here; which
 * fields are required is decided by the validators, not by the type.
 */
export interface ServerConfig {
  name?: string;                  // Namespaced, e.g. io.github.owner/server
  version?: string;
  description?: string;
  license?: string;
  homepage?: string;
  repository?: RepositoryInfo;
  packages?: PackageEntry[];
  remotes?: RemoteEntry[];
}

/**
 * A decoded JSON object. The loader hands over `unknown`; validators only
 * ever look at documents narrowed to this.
 */
export type ConfigObject = Record<string, unknown>;

export const ConfigObjectSchema = z.record(z.string(), z.unknown());

const PackageTypeSchema = z.enum(PACKAGE_TYPES);
const TransportSchema = z.enum(TRANSPORTS);

export function isConfigObject(value: unknown): value is ConfigObject {
  return ConfigObjectSchema.safeParse(value).success;
}

/**
 * Narrow without copying, so the validator sees the caller's own object.
 */
export function asConfigObject(value: unknown): ConfigObject | undefined {
  return isConfigObject(value) ? value : undefined;
}

export function hasField(object: ConfigObject, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, field);
}

/**
 * JSON truthiness: null, '', 0, false, [] and {} count as empty.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.length === 0;
  if (typeof value === 'number') return value === 0 || Number.isNaN(value);
  if (typeof value === 'boolean') return !value;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

/**
 * Render a document value for a diagnostic. Strings are shown as-is,
 * anything else as JSON.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

export function classifyPackageType(raw: unknown): Classified<PackageType> {
  const parsed = PackageTypeSchema.safeParse(raw);
  return parsed.success ? { kind: 'known', value: parsed.data } : { kind: 'unknown', raw };
}

export function classifyTransport(raw: unknown): Classified<Transport> {
  const parsed = TransportSchema.safeParse(raw);
  return parsed.success ? { kind: 'known', value: parsed.data } : { kind: 'unknown', raw };
}

const optionalString = z.string().optional().catch(undefined);

const RepositoryInfoSchema = z.object({
  type: optionalString,
  url: optionalString,
});

// Present values are shown even when mistyped; only an absent key reads as undefined
const displayedString = z
  .unknown()
  .transform(value => (value === undefined ? undefined : formatValue(value)));

const PlatformEntrySchema = z.object({
  os: displayedString,
  arch: displayedString,
  uri: optionalString,
  sha256: optionalString,
});

const PackageEntrySchema = z.object({
  type: optionalString,
  uri: optionalString,
  sha256: optionalString,
  platforms: z.array(PlatformEntrySchema.catch({})).optional().catch(undefined),
});

const RemoteEntrySchema = z.object({
  endpoint: optionalString,
  transport: optionalString,
});

/**
 * Lenient typed view of a manifest: fields of the wrong type read as absent,
 * malformed entries as empty records. Used for display, never for validation.
 */
const ServerConfigSchema = z
  .object({
    name: optionalString,
    version: optionalString,
    description: optionalString,
    license: optionalString,
    homepage: optionalString,
    repository: RepositoryInfoSchema.optional().catch(undefined),
    packages: z.array(PackageEntrySchema.catch({})).optional().catch(undefined),
    remotes: z.array(RemoteEntrySchema.catch({})).optional().catch(undefined),
  })
  .catch({});

export function readServerConfig(document: unknown): ServerConfig {
  return ServerConfigSchema.parse(document);
}

export interface ServerConfigMetadata {
  sourcePath: string;             // Absolute path to the manifest
  loadedAt: string;               // ISO timestamp
}
