export { DefaultArchiveFetcher } from './archive-fetcher.js';
export { MakeBuildToolchain } from './make-toolchain.js';
export { SearchPathFileActivator } from './search-path-activator.js';
export { HttpIndexClient } from './http-index-client.js';
export { CommandTestRunner } from './command-test-runner.js';
