/**
 * Module Identity
 *
 * Canonical identity of one resolved dependency artifact and the
 * file-name conventions used when it is copied into lib/.
 */

export const JAR_NAME_CONVENTIONS = ['default', 'original', 'full', 'no-version'] as const;

/**
 * default:    (name)-(revision).jar
 * original:   file name as resolved upstream
 * full:       (organization).(name)-(revision).jar
 * no-version: (organization).(name).jar
 */
export type JarNameConvention = typeof JAR_NAME_CONVENTIONS[number];

export interface ModuleIdentity {
  readonly organization: string;
  readonly name: string;
  readonly revision: string;
  readonly classifier?: string;
  readonly originalFileName: string;
}

export function createModuleIdentity(fields: ModuleIdentity): ModuleIdentity {
  const identity: ModuleIdentity = {
    organization: fields.organization,
    name: fields.name,
    revision: fields.revision,
    originalFileName: fields.originalFileName,
    ...(fields.classifier !== undefined ? { classifier: fields.classifier } : {}),
  };
  return Object.freeze(identity);
}

function classifierSuffix(module: ModuleIdentity): string {
  return module.classifier !== undefined ? `-${module.classifier}` : '';
}

export function defaultJarName(module: ModuleIdentity): string {
  return `${module.name}-${module.revision}${classifierSuffix(module)}.jar`;
}

export function originalJarName(module: ModuleIdentity): string {
  return module.originalFileName;
}

export function fullJarName(module: ModuleIdentity): string {
  return `${module.organization}.${module.name}-${module.revision}${classifierSuffix(module)}.jar`;
}

export function noVersionJarName(module: ModuleIdentity): string {
  return `${module.organization}.${module.name}${classifierSuffix(module)}.jar`;
}

export function resolveJarName(module: ModuleIdentity, convention: JarNameConvention): string {
  switch (convention) {
    case 'original':
      return originalJarName(module);
    case 'full':
      return fullJarName(module);
    case 'no-version':
      return noVersionJarName(module);
    default:
      return defaultJarName(module);
  }
}

/**
 * organization:name:revision[-classifier]
 */
export function formatModule(module: ModuleIdentity): string {
  return `${module.organization}:${module.name}:${module.revision}${classifierSuffix(module)}`;
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Order by (organization, name, revision, classifier); a missing
 * classifier sorts before any present one.
 */
export function compareModules(a: ModuleIdentity, b: ModuleIdentity): number {
  return (
    compareStrings(a.organization, b.organization) ||
    compareStrings(a.name, b.name) ||
    compareStrings(a.revision, b.revision) ||
    compareClassifiers(a.classifier, b.classifier)
  );
}

function compareClassifiers(a: string | undefined, b: string | undefined): number {
  if (a === undefined) return b === undefined ? 0 : -1;
  if (b === undefined) return 1;
  return compareStrings(a, b);
}

/**
 * Key that is equal for two identities exactly when compareModules returns 0
 */
export function moduleKey(module: ModuleIdentity): string {
  return JSON.stringify([
    module.organization,
    module.name,
    module.revision,
    module.classifier ?? null,
  ]);
}
