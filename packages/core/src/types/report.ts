/**
 * Upstream build data
 *
 * Shapes of what the build system hands over: per-project dependency
 * reports and the project graph.
 */

export interface ModuleId {
  organization: string;
  name: string;
  revision: string;
}

export interface ArtifactRef {
  /** Artifact name as known to the dependency system */
  name: string;
  type?: string;
  extension?: string;
  classifier?: string;
}

export interface ArtifactFile {
  artifact: ArtifactRef;
  /** Resolved file on disk */
  file: string;
}

export interface ModuleReport {
  module: ModuleId;
  artifacts: ArtifactFile[];
}

export interface ConfigurationReport {
  /** e.g. "compile", "runtime", "test" */
  configuration: string;
  modules: ModuleReport[];
}

export interface UpdateReport {
  configurations: ConfigurationReport[];
}

/**
 * One project of the build, as described by the build manifest
 */
export interface ProjectDescriptor {
  /** Names of projects this one depends on */
  uses: string[];
  /** Packaged jars of this project's own code */
  jars: string[];
  /** Jars dropped into the project's lib folder by hand */
  unmanagedJars: string[];
  reports: UpdateReport[];
}

export interface BuildManifest {
  name: string;
  version: string;
  /** Root directory the relative paths in the manifest are resolved against */
  baseDir: string;
  /** Where pack/ and the archive go; defaults to <baseDir>/target */
  targetDir?: string;
  /** Project packaging starts from */
  root: string;
  projects: Record<string, ProjectDescriptor>;
}
