/**
 * Resource-level comparison
 *
 * Pulls the resource list out of whichever Terraform JSON shape a document
 * has, keyed by resource address, and classifies each address as added,
 * removed, modified or unchanged between two documents.
 */

import { logger } from '../utils';
import { computeDiff, hasDrift } from './structural-diff';
import type {
  DiffOptions,
  DiffResult,
  ExtractedResources,
  JsonObject,
  JsonValue,
  ResourceComparison,
  ResourceSnapshot,
} from './types';

function asObject(value: JsonValue | undefined): JsonObject | undefined {
  if (value === undefined || value === null || Array.isArray(value) || typeof value !== 'object') {
    return undefined;
  }
  return value;
}

function asArray(value: JsonValue | undefined): JsonValue[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

function asString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Walk a `root_module` block (plan `planned_values` or `terraform show -json`
 * state `values`) including nested child modules.
 */
function collectModuleResources(module: JsonObject, into: Map<string, ResourceSnapshot>): void {
  for (const item of asArray(module.resources) ?? []) {
    const resource = asObject(item);
    const address = asString(resource?.address);
    if (!resource || !address) continue;
    into.set(address, {
      address,
      type: asString(resource.type) ?? '',
      name: asString(resource.name) ?? '',
      values: resource.values ?? null,
    });
  }

  for (const child of asArray(module.child_modules) ?? []) {
    const childModule = asObject(child);
    if (childModule) {
      collectModuleResources(childModule, into);
    }
  }
}

function formatIndexKey(key: JsonValue | undefined): string {
  if (typeof key === 'number') return `[${key}]`;
  if (typeof key === 'string') return `[${JSON.stringify(key)}]`;
  return '';
}

/**
 * Raw `terraform.tfstate` (format version 4): one snapshot per instance.
 */
function collectStateResources(resources: JsonValue[], into: Map<string, ResourceSnapshot>): void {
  for (const item of resources) {
    const resource = asObject(item);
    if (!resource) continue;

    const type = asString(resource.type) ?? '';
    const name = asString(resource.name) ?? '';
    const modulePrefix = asString(resource.module) ? `${asString(resource.module)}.` : '';
    const modePrefix = asString(resource.mode) === 'data' ? 'data.' : '';
    const base = `${modulePrefix}${modePrefix}${type}.${name}`;

    for (const instanceItem of asArray(resource.instances) ?? []) {
      const instance = asObject(instanceItem);
      if (!instance) continue;
      const address = `${base}${formatIndexKey(instance.index_key)}`;
      into.set(address, { address, type, name, values: instance.attributes ?? null });
    }
  }
}

function collectResourceChanges(changes: JsonValue[], into: Map<string, ResourceSnapshot>): void {
  for (const item of changes) {
    const change = asObject(item);
    const address = asString(change?.address);
    if (!change || !address) continue;
    into.set(address, {
      address,
      type: asString(change.type) ?? '',
      name: asString(change.name) ?? '',
      values: asObject(change.change)?.after ?? null,
    });
  }
}

/**
 * Extract resources keyed by address. The first recognised shape wins:
 * `planned_values`, then `values`, then raw state `resources`, then
 * `resource_changes`.
 */
export function extractResources(document: JsonValue): ExtractedResources {
  const resources = new Map<string, ResourceSnapshot>();
  const root = asObject(document);
  if (!root) {
    return { source: 'none', resources };
  }

  const plannedRoot = asObject(asObject(root.planned_values)?.root_module);
  if (plannedRoot) {
    collectModuleResources(plannedRoot, resources);
    return { source: 'planned_values', resources };
  }

  const valuesRoot = asObject(asObject(root.values)?.root_module);
  if (valuesRoot) {
    collectModuleResources(valuesRoot, resources);
    return { source: 'values', resources };
  }

  const stateResources = asArray(root.resources);
  if (stateResources) {
    collectStateResources(stateResources, resources);
    return { source: 'resources', resources };
  }

  const changes = asArray(root.resource_changes);
  if (changes) {
    collectResourceChanges(changes, resources);
    return { source: 'resource_changes', resources };
  }

  return { source: 'none', resources };
}

/**
 * Classify every address found in either document.
 */
export function compareResources(
  before: Map<string, ResourceSnapshot>,
  after: Map<string, ResourceSnapshot>,
  options: DiffOptions = {}
): ResourceComparison {
  const added: string[] = [];
  const removed: string[] = [];
  const unchanged: string[] = [];
  const modified = new Map<string, DiffResult>();

  for (const address of after.keys()) {
    if (!before.has(address)) {
      added.push(address);
    }
  }

  const common: string[] = [];
  for (const address of before.keys()) {
    if (after.has(address)) {
      common.push(address);
    } else {
      removed.push(address);
    }
  }

  for (const address of common.sort()) {
    const oldResource = before.get(address);
    const newResource = after.get(address);
    if (!oldResource || !newResource) continue;

    const result = computeDiff(oldResource.values, newResource.values, options);
    if (hasDrift(result)) {
      modified.set(address, result);
    } else {
      unchanged.push(address);
    }
  }

  logger.debug('Resource comparison complete', {
    added: added.length,
    removed: removed.length,
    modified: modified.size,
    unchanged: unchanged.length,
  });

  return {
    added: added.sort(),
    removed: removed.sort(),
    modified,
    unchanged,
  };
}
