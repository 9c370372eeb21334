import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

export const PROMPT_TEMPLATE_EXTENSION = '.tpl';

export interface PromptTemplateSource {
  resolve(ref: string): string | undefined;
  refs(): string[];
}

export function createInMemoryTemplateSource(templates: Readonly<Record<string, string>>): PromptTemplateSource {
  const entries = new Map(Object.entries(templates));

  return {
    resolve: ref => entries.get(ref),
    refs: () => [...entries.keys()],
  };
}

export const emptyTemplateSource: PromptTemplateSource = createInMemoryTemplateSource({});

/**
 * Reads every `*.tpl` file in `directory`; a template's ref is its file name without the extension.
 */
export async function loadTemplateDirectory(directory: string): Promise<PromptTemplateSource> {
  const entries = await readdir(directory, { withFileTypes: true });
  const templates: Record<string, string> = {};

  for (const entry of entries) {
    if (!entry.isFile() || extname(entry.name) !== PROMPT_TEMPLATE_EXTENSION) {
      continue;
    }

    const ref = basename(entry.name, PROMPT_TEMPLATE_EXTENSION);
    templates[ref] = await readFile(join(directory, entry.name), 'utf8');
  }

  return createInMemoryTemplateSource(templates);
}
