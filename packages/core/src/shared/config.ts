/**
 * @file src/shared/config.ts
 * @description Handles persistent docstring-lint configuration (.docstringlintrc.json).
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const CONFIG_FILENAME = '.docstringlintrc.json';

export const DocstringLintConfigSchema = z
  .object({
    paths: z.array(z.string()).default([]),
    requireParamTypes: z.boolean().default(false),
    checkReferences: z.boolean().default(true),
    validateTypes: z.boolean().default(true),
    collectErrors: z.boolean().default(false),
    excludeFiles: z.array(z.string()).default([]),
    verbose: z.boolean().default(false),
  })
  .strict();

export type DocstringLintConfig = z.infer<typeof DocstringLintConfigSchema>;

export const DEFAULT_CONFIG: DocstringLintConfig = DocstringLintConfigSchema.parse({});

export interface LoadedConfig {
  config: DocstringLintConfig;
  /** Absolute path of the file the values came from, or `null` when defaults were used. */
  source: string | null;
  warning?: string;
}

export const configPath = (cwd: string = process.cwd()): string => path.join(cwd, CONFIG_FILENAME);

const formatZodIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');

export const loadConfig = (cwd: string = process.cwd()): LoadedConfig => {
  const target = configPath(cwd);
  if (!fs.existsSync(target)) {
    return { config: { ...DEFAULT_CONFIG }, source: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(target, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      config: { ...DEFAULT_CONFIG },
      source: null,
      warning: `Ignoring ${CONFIG_FILENAME}: ${reason}`,
    };
  }

  const parsed = DocstringLintConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      config: { ...DEFAULT_CONFIG },
      source: null,
      warning: `Ignoring ${CONFIG_FILENAME}: ${formatZodIssues(parsed.error)}`,
    };
  }
  return { config: parsed.data, source: target };
};

/**
 * Merges `update` over the current file contents (or the defaults) and writes the result.
 */
export const writeConfig = (
  update: Partial<DocstringLintConfig>,
  cwd: string = process.cwd(),
): DocstringLintConfig => {
  const { config: current } = loadConfig(cwd);
  const next = DocstringLintConfigSchema.parse({ ...current, ...update });
  fs.writeFileSync(configPath(cwd), `${JSON.stringify(next, null, 2)}\n`, 'utf8');
  return next;
};

export type CheckConfigOverrides = Partial<DocstringLintConfig>;

const pick = <T>(override: T | undefined, configured: T): T =>
  override === undefined ? configured : override;

/**
 * Flags win over the file, which wins over the defaults. An empty `paths` override keeps the
 * configured paths.
 */
export const resolveCheckConfig = (
  overrides: CheckConfigOverrides = {},
  cwd: string = process.cwd(),
): LoadedConfig => {
  const loaded = loadConfig(cwd);
  const file = loaded.config;
  const config: DocstringLintConfig = {
    paths: overrides.paths && overrides.paths.length ? overrides.paths : file.paths,
    requireParamTypes: pick(overrides.requireParamTypes, file.requireParamTypes),
    checkReferences: pick(overrides.checkReferences, file.checkReferences),
    validateTypes: pick(overrides.validateTypes, file.validateTypes),
    collectErrors: pick(overrides.collectErrors, file.collectErrors),
    excludeFiles: pick(overrides.excludeFiles, file.excludeFiles),
    verbose: pick(overrides.verbose, file.verbose),
  };
  return { ...loaded, config };
};
