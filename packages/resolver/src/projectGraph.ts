/**
 * Project Graph
 *
 * Depth-first reachability over the "uses" relation of the build.
 */

import { ManifestError, type BuildManifest, type ProjectDescriptor } from '@jarpack/core';

export interface SelectedProject {
  name: string;
  descriptor: ProjectDescriptor;
}

/**
 * Projects reachable from `root`, root first, each project's subtree in
 * declaration order, duplicates dropped at their later occurrences.
 * Names in `exclude` are removed from the result afterwards, so projects
 * only reachable through an excluded one are still selected.
 */
export function collectProjects(
  manifest: Pick<BuildManifest, 'root' | 'projects'>,
  exclude: readonly string[] = []
): SelectedProject[] {
  const visited = new Set<string>();
  const ordered: SelectedProject[] = [];

  const visit = (name: string, from?: string): void => {
    if (visited.has(name)) return;
    const descriptor = Object.hasOwn(manifest.projects, name) ? manifest.projects[name] : undefined;
    if (!descriptor) {
      throw new ManifestError(
        from
          ? `Project ${from} uses unknown project ${name}`
          : `Root project ${name} is not defined`,
        { project: name, usedBy: from }
      );
    }
    visited.add(name);
    ordered.push({ name, descriptor });
    for (const child of descriptor.uses) {
      visit(child, name);
    }
  };

  visit(manifest.root);

  const excluded = new Set(exclude);
  return ordered.filter((project) => !excluded.has(project.name));
}
