import { promises as fs } from 'fs';
import path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../errors/validation-error';
import { normalizeValidationError } from './errors';

const DEFAULT_MAX_PATH_LENGTH = 4096;
const DEFAULT_MAX_CONTENT_SIZE = 1024 * 1024; // 1MB

const pathStringSchema = z
  .string({
    required_error: 'Path value is required',
    invalid_type_error: 'Path must be a string',
  })
  .min(1, 'Path cannot be empty')
  .max(DEFAULT_MAX_PATH_LENGTH, 'Path is too long')
  .refine((value) => !value.includes('\0'), {
    message: 'Path cannot contain null bytes',
  });

export interface SafeFilePathOptions {
  readonly baseDir?: string;
  readonly allowedExtensions?: readonly string[];
}

function ensureAllowedExtension(filePath: string, allowed?: readonly string[]): void {
  if (!allowed || allowed.length === 0) {
    return;
  }

  const ext = path.extname(filePath).toLowerCase();
  const normalizedList = allowed.map((value) =>
    value.startsWith('.') ? value.toLowerCase() : `.${value.toLowerCase()}`
  );

  if (!normalizedList.includes(ext)) {
    throw new ValidationError('File extension is not permitted', {
      context: { data: { filePath, allowedExtensions: normalizedList } },
    });
  }
}

function isWithinBase(candidate: string, baseDir: string): boolean {
  const baseWithSep = baseDir.endsWith(path.sep) ? baseDir : `${baseDir}${path.sep}`;
  return candidate === baseDir || candidate.startsWith(baseWithSep);
}

async function tryRealpath(target: string): Promise<string | null> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw new ValidationError('Unable to resolve real path', {
      cause: error,
      context: { data: { path: target } },
    });
  }
}

/**
 * Resolve `rawPath` and confirm it stays inside `baseDir`, symlinks included.
 */
export async function safeFilePath(
  rawPath: string,
  options: SafeFilePathOptions = {}
): Promise<string> {
  let parsedPath: string;
  try {
    parsedPath = pathStringSchema.parse(rawPath);
  } catch (error) {
    throw normalizeValidationError(error);
  }

  const normalized = path.normalize(parsedPath);
  if (normalized.split(path.sep).some((segment) => segment === '..')) {
    throw new ValidationError('Path cannot contain parent directory traversals', {
      context: { data: { path: parsedPath } },
    });
  }

  let sanitizedPath = path.resolve(normalized);

  if (options.baseDir) {
    const base = path.resolve(options.baseDir);
    sanitizedPath = path.resolve(base, normalized);
    if (!isWithinBase(sanitizedPath, base)) {
      throw new ValidationError('Path escapes allowed base directory', {
        context: { data: { resolvedPath: sanitizedPath, baseDir: base } },
      });
    }

    const realBase = (await tryRealpath(base)) ?? base;
    const realTarget = await tryRealpath(sanitizedPath);
    if (realTarget && !isWithinBase(realTarget, realBase)) {
      throw new ValidationError('Path escapes allowed base directory via symlink resolution', {
        context: { data: { resolvedPath: realTarget, baseDir: realBase } },
      });
    }
  }

  ensureAllowedExtension(sanitizedPath, options.allowedExtensions);

  return sanitizedPath;
}

export interface StructuredContentOptions<T extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly schema?: T;
  readonly maxSize?: number;
}

/**
 * Parse YAML text and, when a schema is given, validate the result against it.
 */
export function yamlContent<TSchema extends z.ZodTypeAny>(
  rawContent: string,
  options: StructuredContentOptions<TSchema> & { schema: TSchema }
): z.infer<TSchema> {
  const contentSchema = z
    .string({
      required_error: 'YAML content is required',
      invalid_type_error: 'YAML content must be a string',
    })
    .max(options.maxSize ?? DEFAULT_MAX_CONTENT_SIZE, 'YAML content exceeds maximum allowed size')
    .refine((value) => !value.includes('\0'), 'Content cannot contain null bytes');

  let parsed: unknown;
  try {
    parsed = YAML.parse(contentSchema.parse(rawContent));
  } catch (error) {
    throw new ValidationError('Failed to parse YAML content', {
      cause: error,
      context: { data: { message: error instanceof Error ? error.message : String(error) } },
    });
  }

  try {
    return options.schema.parse(parsed ?? {});
  } catch (error) {
    throw normalizeValidationError(error);
  }
}
