/**
 * Template store: named, read-only template trees.
 *
 * Each template is a directory skeleton the editor recognizes as a draft,
 * plus the name of the metadata document inside it.
 */

import { stat } from 'fs/promises';
import path from 'path';
import { errnoCode } from './fs-utils';

export interface TemplateDefinition {
  name: string;
  /** Metadata document filename inside the template tree. */
  metadataFile: string;
}

export interface ResolvedTemplate extends TemplateDefinition {
  /** Absolute path of the template tree. */
  path: string;
}

export interface TemplateStore {
  /** Configured template names, whether or not their trees exist. */
  names(): string[];
  resolve(name: string): Promise<ResolvedTemplate | null>;
}

/** The editor variants the service knows how to seed. */
export const DEFAULT_TEMPLATES: readonly TemplateDefinition[] = [
  { name: 'template', metadataFile: 'draft_content.json' },
  { name: 'template_capcut', metadataFile: 'draft_info.json' },
];

/** Metadata filename for a template name, falling back to the default template's. */
export function metadataFileFor(name: string, definitions: readonly TemplateDefinition[] = DEFAULT_TEMPLATES): string {
  return definitions.find((d) => d.name === name)?.metadataFile ?? 'draft_content.json';
}

/** Templates stored as `<root>/<name>` directories. */
export class FileSystemTemplateStore implements TemplateStore {
  private definitions: Map<string, TemplateDefinition>;

  constructor(
    private root: string,
    definitions: readonly TemplateDefinition[] = DEFAULT_TEMPLATES,
  ) {
    this.definitions = new Map(definitions.map((d) => [d.name, d]));
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }

  async resolve(name: string): Promise<ResolvedTemplate | null> {
    const definition = this.definitions.get(name);
    if (!definition) return null;

    const templatePath = path.resolve(this.root, definition.name);
    try {
      const info = await stat(templatePath);
      return info.isDirectory() ? { ...definition, path: templatePath } : null;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
  }
}
