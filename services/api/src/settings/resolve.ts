import fs from 'fs';
import path from 'path';
import { parse } from 'dotenv';
import { z } from 'zod';
import { ValidationError, issuesFromZod, summarizeIssues } from '../errors';

/** Where a resolved value came from, highest precedence first. */
export type SettingSource = 'os' | 'file' | 'default';

export interface EnvFile {
  path: string;
  values: Record<string, string>;
}

export interface SettingsSources {
  env?: Record<string, string | undefined>;
  file?: EnvFile | null;
}

export type SettingsValues<Shape extends z.ZodRawShape> = z.objectOutputType<Shape, z.ZodTypeAny, 'strip'>;

export interface SettingEntry {
  key: string;
  value: unknown;
  source: SettingSource;
}

/**
 * Immutable result of `resolveSettings`: every declared field has exactly one
 * value and one recorded source.
 */
export class Settings<Shape extends z.ZodRawShape> {
  readonly values: Readonly<SettingsValues<Shape>>;

  constructor(
    values: SettingsValues<Shape>,
    private readonly resolved: ReadonlyMap<string, { value: unknown; source: SettingSource }>,
    readonly envFile: string | null,
  ) {
    this.values = Object.freeze(values);
    Object.freeze(this);
  }

  get<K extends keyof SettingsValues<Shape>>(key: K): SettingsValues<Shape>[K] {
    return this.values[key];
  }

  source(key: Extract<keyof Shape, string>): SettingSource {
    return this.resolved.get(key)?.source ?? 'default';
  }

  entries(): SettingEntry[] {
    return [...this.resolved].map(([key, { value, source }]) => ({ key, value, source }));
  }
}

/**
 * Resolves each field of `shape` from the OS environment, then the env file,
 * then the schema's own `.default()`. Keys not declared in `shape` are
 * ignored. Throws `ValidationError` listing every field that is missing
 * everywhere or fails its schema.
 */
export function resolveSettings<Shape extends z.ZodRawShape>(
  shape: Shape,
  sources: SettingsSources = {},
): Settings<Shape> {
  const env = sources.env ?? {};
  const fileValues = sources.file?.values ?? {};

  const raw: Record<string, string> = {};
  const origin = new Map<string, SettingSource>();
  for (const key of Object.keys(shape)) {
    const fromEnv = env[key];
    if (fromEnv !== undefined) {
      raw[key] = fromEnv;
      origin.set(key, 'os');
    } else if (Object.prototype.hasOwnProperty.call(fileValues, key)) {
      raw[key] = fileValues[key];
      origin.set(key, 'file');
    } else {
      origin.set(key, 'default');
    }
  }

  const parsed = z.object(shape).safeParse(raw);
  if (!parsed.success) {
    const issues = issuesFromZod(parsed.error);
    throw new ValidationError(`invalid configuration: ${summarizeIssues(issues)}`, issues);
  }

  const parsedEntries: Array<[string, unknown]> = Object.entries(parsed.data);
  const parsedValues = new Map(parsedEntries);
  const resolved = new Map<string, { value: unknown; source: SettingSource }>();
  for (const [key, source] of origin) {
    resolved.set(key, { value: parsedValues.get(key), source });
  }

  return new Settings(parsed.data, resolved, sources.file?.path ?? null);
}

/**
 * Reads `fileName` from `cwd`, or from the nearest parent directory that has
 * one. The file is parsed without touching `process.env`. Returns null when
 * no file is found.
 */
export function loadEnvFile(fileName = '.env', cwd = process.cwd()): EnvFile | null {
  const found = findEnvFile(fileName, cwd);
  if (!found) return null;
  return { path: found, values: parse(fs.readFileSync(found)) };
}

function findEnvFile(fileName: string, cwd: string): string | null {
  if (path.isAbsolute(fileName)) {
    return fs.existsSync(fileName) ? fileName : null;
  }

  let dir = path.resolve(cwd);
  for (;;) {
    const candidate = path.join(dir, fileName);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

const SOURCE_LABELS: Record<SettingSource, string> = {
  os: '[OS]',
  file: '[.env]',
  default: '[default]',
};

function isSecretKey(key: string): boolean {
  return key.includes('PASS');
}

/**
 * Human-readable precedence report, one line per field, secrets masked.
 * `computed` values are appended with a `[computed]` tag.
 */
export function describeSettings<Shape extends z.ZodRawShape>(
  settings: Settings<Shape>,
  computed: Record<string, string> = {},
): string[] {
  const lines = settings.entries().map(({ key, value, source }) => {
    const display = isSecretKey(key) ? (value ? '***' : '(empty)') : JSON.stringify(value);
    return `${key}: ${display} ${SOURCE_LABELS[source]}`;
  });
  for (const [key, value] of Object.entries(computed)) {
    lines.push(`${key}: ${value} [computed]`);
  }
  return lines;
}
