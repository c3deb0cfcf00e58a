/**
 * Dependency Collector
 *
 * Merges dependency reports of every selected project into one sorted,
 * deduplicated ModuleIdentity -> file mapping.
 */

import {
  createModuleIdentity,
  compareModules,
  moduleKey,
  type ArtifactRef,
  type ModuleId,
  type ModuleIdentity,
  type UpdateReport,
} from '@jarpack/core';
import { basename } from 'node:path';

export const RUNTIME_CONFIGURATION = 'runtime';

/**
 * Project-level predicate over (configuration, module, artifact)
 */
export type DependencyFilter = (
  configuration: string,
  module: ModuleId,
  artifact: ArtifactRef
) => boolean;

export const allPass: DependencyFilter = () => true;

export interface ResolvedDependency {
  module: ModuleIdentity;
  file: string;
}

/**
 * Sorted by compareModules, at most one entry per identity
 */
export type ResolvedDependencySet = readonly ResolvedDependency[];

export function collectDependencies(
  reports: readonly UpdateReport[],
  classifierAllowlist: ReadonlySet<string> | readonly string[] = [],
  filter: DependencyFilter = allPass
): ResolvedDependencySet {
  const allowed = new Set(classifierAllowlist);
  const byKey = new Map<string, ResolvedDependency>();

  for (const report of reports) {
    for (const config of report.configurations) {
      if (config.configuration !== RUNTIME_CONFIGURATION) continue;

      for (const { module, artifacts } of config.modules) {
        for (const { artifact, file } of artifacts) {
          if (!filter(config.configuration, module, artifact)) continue;
          if (artifact.classifier !== undefined && !allowed.has(artifact.classifier)) continue;

          const identity = createModuleIdentity({
            organization: module.organization,
            name: module.name,
            revision: module.revision,
            classifier: artifact.classifier,
            originalFileName: basename(file),
          });
          // Same identity from another project: the later file wins
          byKey.set(moduleKey(identity), { module: identity, file });
        }
      }
    }
  }

  return [...byKey.values()].sort((a, b) => compareModules(a.module, b.module));
}
