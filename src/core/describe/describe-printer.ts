import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import type { PackageDescription } from './describe-pipeline.js';

function field(label: string, value: string | undefined): string[] {
  return value ? [`${label}: ${value}`] : [];
}

export function printPackageDescriptions(descriptions: PackageDescription[], output: OutputPort = resolveOutput()): void {
  if (descriptions.length === 0) {
    output.info('No packages installed.');
    return;
  }

  for (const desc of descriptions) {
    const lines = [
      `Version: ${desc.version} (${desc.scope})`,
      `Status: ${desc.status}`,
      ...field('Description', desc.description),
      ...field('Author', desc.author),
      ...field('Maintainer', desc.maintainer),
      ...field('License', desc.license),
      ...field('Url', desc.url),
      `Depends on: ${desc.dependencies.length > 0 ? desc.dependencies.join(', ') : 'none'}`
    ];
    if (desc.providedFiles) {
      lines.push('Provides:', ...desc.providedFiles.map(file => `  ${file}`));
    }
    if (desc.archFiles && desc.archFiles.length > 0) {
      lines.push('Compiled:', ...desc.archFiles.map(file => `  ${file}`));
    }
    output.note(lines.join('\n'), desc.name);
  }
}
