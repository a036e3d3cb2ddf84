import { readFile } from 'fs/promises';
import { text } from 'stream/consumers';
import { CORE_SCHEMA, loadAll } from 'js-yaml';
import { z } from 'zod';
import { ManifestError, type ManifestIssue } from '../core/errors';
import { ActionSchema, type Action, type TargetObject } from '../core/types';

export const ACTION_ANNOTATION = 'batch-apply.dev/action';
export const DEFAULT_NAMESPACE = 'default';

export interface LoadOptions {
  // Where the text came from, used in error messages
  source: string;
  defaultNamespace?: string;
}

const MetadataSchema = z
  .object({
    name: z.string().min(1),
    namespace: z.string().min(1).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

const ManifestSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: MetadataSchema,
  })
  .passthrough();

const ListSchema = z.object({
  kind: z.string().endsWith('List'),
  items: z.array(z.unknown()),
});

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join(', ');
}

// v1 List documents are flattened into their items
function expandLists(documents: unknown[]): Array<{ document: number; value: unknown }> {
  const expanded: Array<{ document: number; value: unknown }> = [];
  documents.forEach((value, index) => {
    const list = ListSchema.safeParse(value);
    if (list.success) {
      for (const item of list.data.items) {
        expanded.push({ document: index + 1, value: item });
      }
    } else {
      expanded.push({ document: index + 1, value });
    }
  });
  return expanded;
}

function toTarget(value: unknown, defaultNamespace: string): TargetObject | string {
  const parsed = ManifestSchema.safeParse(value);
  if (!parsed.success) {
    return describeIssues(parsed.error);
  }

  const manifest = parsed.data;
  const rawAction = manifest.metadata.annotations?.[ACTION_ANNOTATION];
  let action: Action = 'apply';
  if (rawAction !== undefined) {
    const parsedAction = ActionSchema.safeParse(rawAction);
    if (!parsedAction.success) {
      return `unknown ${ACTION_ANNOTATION} annotation value "${rawAction}" (expected apply or delete)`;
    }
    action = parsedAction.data;
  }

  const target: TargetObject = {
    apiVersion: manifest.apiVersion,
    kind: manifest.kind,
    name: manifest.metadata.name,
    defaultNamespace,
    action,
    manifest: Object.freeze({ ...manifest }),
  };
  // Scope is only known after discovery, so the default stays separate
  const { namespace } = manifest.metadata;
  return Object.freeze(namespace === undefined ? target : { ...target, namespace });
}

/**
 * Turn a multi-document YAML stream into target objects. Any malformed
 * document rejects the whole input.
 */
export function parseManifests(yamlText: string, options: LoadOptions): TargetObject[] {
  let documents: unknown[];
  try {
    // No timestamp or binary types: the payload reaches the server as written
    documents = loadAll(yamlText, undefined, { schema: CORE_SCHEMA });
  } catch (error) {
    throw ManifestError.unreadable(options.source, error);
  }

  const defaultNamespace = options.defaultNamespace ?? DEFAULT_NAMESPACE;
  const targets: TargetObject[] = [];
  const issues: ManifestIssue[] = [];

  for (const { document, value } of expandLists(documents)) {
    if (value === null || value === undefined) {
      continue;
    }
    const result = toTarget(value, defaultNamespace);
    if (typeof result === 'string') {
      issues.push({ document, message: result });
    } else {
      targets.push(result);
    }
  }

  if (issues.length > 0) {
    throw ManifestError.invalidDocuments(options.source, issues);
  }
  return targets;
}

/**
 * Read manifests from a file, or from stdin when the path is "-"
 */
export async function readManifests(
  path: string,
  options: Omit<LoadOptions, 'source'> = {}
): Promise<TargetObject[]> {
  const source = path === '-' ? 'stdin' : path;
  let content: string;
  try {
    content = path === '-' ? await text(process.stdin) : await readFile(path, 'utf8');
  } catch (error) {
    throw ManifestError.unreadable(source, error);
  }
  return parseManifests(content, { ...options, source });
}
