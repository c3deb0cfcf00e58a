/**
 * @jarpack/resolver
 *
 * Project selection and dependency collection.
 */

export { collectProjects, type SelectedProject } from './projectGraph.js';

export {
  collectDependencies,
  allPass,
  RUNTIME_CONFIGURATION,
  type DependencyFilter,
  type ResolvedDependency,
  type ResolvedDependencySet,
} from './collector.js';

export { selectProjectInputs, type ProjectInputs } from './inputs.js';
