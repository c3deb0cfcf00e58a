/**
 * Project Inputs
 *
 * Gathers what the packager needs from the selected projects of a
 * build manifest in a single graph walk.
 */

import { resolveFrom } from '@jarpack/utils';
import type { BuildManifest, UpdateReport } from '@jarpack/core';
import { collectProjects } from './projectGraph.js';

export interface ProjectInputs {
  /** Selected project names, in traversal order */
  projects: string[];
  /** Absolute paths of the projects' own jars */
  projectJars: string[];
  /** Absolute paths of hand-managed jars */
  unmanagedJars: string[];
  reports: UpdateReport[];
}

export function selectProjectInputs(
  manifest: BuildManifest,
  exclude: readonly string[] = []
): ProjectInputs {
  const selected = collectProjects(manifest, exclude);
  const resolve = (p: string): string => resolveFrom(manifest.baseDir, p);

  return {
    projects: selected.map((p) => p.name),
    projectJars: selected.flatMap((p) => p.descriptor.jars.map(resolve)),
    unmanagedJars: selected.flatMap((p) => p.descriptor.unmanagedJars.map(resolve)),
    reports: selected.flatMap((p) =>
      p.descriptor.reports.map((report) => ({
        configurations: report.configurations.map((config) => ({
          configuration: config.configuration,
          modules: config.modules.map((m) => ({
            module: m.module,
            artifacts: m.artifacts.map((a) => ({ artifact: a.artifact, file: resolve(a.file) })),
          })),
        })),
      }))
    ),
  };
}
