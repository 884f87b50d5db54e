import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';

/** Writes a brick directory: `brick.yaml` plus the given files under `__brick__/`. */
export function writeBrick(root: string, manifest: string, files: Record<string, string>): string {
  mkdirSync(root, { recursive: true });
  writeFileSync(join(root, 'brick.yaml'), manifest);

  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(root, '__brick__', path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }

  return root;
}

export const WIDGET_MANIFEST = `
name: widget
description: A widget with models
version: 1.2.0
vars:
  name:
    type: string
    prompt: Widget name?
  models:
    type: list
    defaults: [user]
`;

export const WIDGET_FILES: Record<string, string> = {
  'README.md': 'Generated by {{name}}',
  'lib/{{snakeCase name}}.ts': '{{~ header }}\nclass {{pascalCase name}} {}',
  'lib/models/{{#models}}{{{.}}}{{/models}}.ts': 'class {{pascalCase models}} {}',
  '{{~ header }}': '// {{name}}'
};
