/**
 * Collaborator Ports
 *
 * The side effects the package engine delegates: downloading and unpacking
 * archives, compiling sources, switching the environment's search path,
 * asking the remote index for versions and running package self tests.
 * Core modules depend on these interfaces only; default adapters live in
 * ../adapters and tests substitute in-process fakes.
 */

export interface ArchiveFetcher {
  /**
   * Materialize a package source (archive path, directory, or URL) as an
   * unpacked tree inside `stagingRoot`.
   *
   * @returns absolute path of the unpacked tree
   * @throws FetchError
   */
  fetch(locator: string, stagingRoot: string): Promise<string>;
}

export interface BuildManifest {
  name: string;
  version: string;
  /** Directory holding package.yml, inst/ and src/ */
  packageRoot: string;
  /** Interpreted files, relative to `<packageRoot>/inst` */
  providedFiles: string[];
  /** Compiled files, absolute paths */
  archFiles: string[];
}

export interface BuildToolchain {
  /**
   * @throws BuildError
   */
  build(stagingPath: string): Promise<BuildManifest>;
}

export interface PathActivator {
  /** Add a package's directories to the search path. Repeated activation is a no-op. */
  activate(directory: string, archDirectory: string): Promise<void>;
  deactivate(directory: string, archDirectory: string): Promise<void>;
  /** Directories currently on the search path */
  activeDirectories(): Promise<string[]>;
}

export interface RemoteIndexClient {
  /**
   * @throws PackageNotFoundError when the index does not know the package
   */
  latestVersion(name: string): Promise<string>;
  downloadUrl(name: string, version: string): string;
  listPackages(): Promise<string[]>;
}

export interface PackageTestSummary {
  passed: number;
  failed: number;
}

export interface PackageTestRunner {
  run(name: string, directories: string[]): Promise<PackageTestSummary>;
}

export interface Collaborators {
  fetcher: ArchiveFetcher;
  toolchain: BuildToolchain;
  activator: PathActivator;
  index: RemoteIndexClient;
  testRunner: PackageTestRunner;
}
