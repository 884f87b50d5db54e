import { describe, it, expect } from 'vitest';
import {
  fileContentsEqual,
  permutations,
  rewritePathLoops,
  runSubstitution,
  templateFile
} from '../../src/substitution.js';

const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe('permutations', () => {
  it('should yield the Cartesian product with the last list varying fastest', () => {
    const result = Array.from(permutations<number | string>([[1, 2], ['a', 'b']]));
    expect(result).toEqual([[1, 'a'], [1, 'b'], [2, 'a'], [2, 'b']]);
  });

  it('should yield one empty tuple for no lists', () => {
    expect(Array.from(permutations([]))).toEqual([[]]);
  });

  it('should yield nothing when any list is empty', () => {
    expect(Array.from(permutations<number>([[1], []]))).toEqual([]);
  });

  it('should handle many lists without recursion', () => {
    const lists = Array.from({ length: 12 }, () => [0, 1]);
    expect(Array.from(permutations(lists))).toHaveLength(4096);
  });
});

describe('rewritePathLoops', () => {
  it('should keep the text around the value token', () => {
    expect(rewritePathLoops('components/{{#models}}{{{.}}}/model.ts{{/models}}', { models: ['a'] }))
      .toEqual({ path: 'components/{{models}}/model.ts', keys: ['models'] });
  });

  it('should rewrite field values to dotted paths', () => {
    expect(rewritePathLoops('{{#models}}{{{name}}}.ts{{/models}}', { models: [{ name: 'a' }] }))
      .toEqual({ path: '{{models.name}}.ts', keys: ['models'] });
  });

  it('should rewrite every section that reuses the same list', () => {
    expect(rewritePathLoops('{{#pages}}{{{.}}}{{/pages}}/{{#pages}}{{{.}}}{{/pages}}_page.ts', { pages: ['home'] }))
      .toEqual({ path: '{{pages}}/{{pages}}_page.ts', keys: ['pages'] });
  });

  it('should leave loops over non-list bindings alone', () => {
    expect(rewritePathLoops('{{#flag}}{{{.}}}{{/flag}}.txt', { flag: true }))
      .toEqual({ path: '{{#flag}}{{{.}}}{{/flag}}.txt', keys: [] });
  });
});

describe('runSubstitution', () => {
  it('should expand a path loop into one file per element', () => {
    const file = templateFile(
      'components/{{#models}}{{{.}}}/model.ts{{/models}}',
      'class {{pascalCase models}} {}'
    );

    const results = runSubstitution(file, { models: ['user', 'order'] }, new Map());

    expect(results.map(result => result.path)).toEqual([
      'components/user/model.ts',
      'components/order/model.ts'
    ]);
    expect(results.map(result => decode(result.content))).toEqual(['class User {}', 'class Order {}']);
  });

  it('should substitute the same element into repeated sections', () => {
    const file = templateFile('{{#pages}}{{{.}}}{{/pages}}/{{#pages}}{{{.}}}{{/pages}}_page.ts', 'x');

    const results = runSubstitution(file, { pages: ['home', 'about'] }, new Map());

    expect(results.map(result => result.path)).toEqual(['home/home_page.ts', 'about/about_page.ts']);
  });

  it('should produce m x k files for two list loops', () => {
    const file = templateFile('{{#a}}{{{.}}}{{/a}}_{{#b}}{{{.}}}{{/b}}.txt', '{{a}}{{b}}');

    const results = runSubstitution(file, { a: ['x', 'y'], b: ['1', '2', '3'] }, new Map());

    expect(results.map(result => result.path)).toEqual([
      'x_1.txt', 'x_2.txt', 'x_3.txt',
      'y_1.txt', 'y_2.txt', 'y_3.txt'
    ]);
    expect(results.map(result => decode(result.content))).toEqual(['x1', 'x2', 'x3', 'y1', 'y2', 'y3']);
  });

  it('should only permute lists the path references', () => {
    const file = templateFile('{{#a}}{{{.}}}{{/a}}.txt', 'static');

    const results = runSubstitution(file, { a: ['x', 'y'], unrelated: ['1', '2', '3'] }, new Map());

    expect(results.map(result => result.path)).toEqual(['x.txt', 'y.txt']);
  });

  it('should expand loops over map elements by field', () => {
    const file = templateFile('lib/{{#models}}{{{name}}}.ts{{/models}}', '// {{models.table}}');
    const models = [
      { name: 'user', table: 'users' },
      { name: 'order', table: 'orders' }
    ];

    const results = runSubstitution(file, { models }, new Map());

    expect(results.map(result => result.path)).toEqual(['lib/user.ts', 'lib/order.ts']);
    expect(results.map(result => decode(result.content))).toEqual(['// users', '// orders']);
  });

  it('should collapse duplicate path and content pairs', () => {
    const file = templateFile('{{#a}}{{{.}}}{{/a}}.txt', 'same');
    expect(runSubstitution(file, { a: ['x', 'x'] }, new Map())).toHaveLength(1);
  });

  it('should produce nothing for an empty list', () => {
    const file = templateFile('{{#a}}{{{.}}}{{/a}}.txt', 'x');
    expect(runSubstitution(file, { a: [] }, new Map())).toEqual([]);
  });

  it('should drop a loop over a non-list binding from the path', () => {
    const file = templateFile('dir/{{#flag}}{{{.}}}{{/flag}}file.txt', 'x');
    expect(runSubstitution(file, { flag: true }, new Map()).map(result => result.path)).toEqual(['dir/file.txt']);
  });

  it('should render a path without loops once', () => {
    const content = new TextEncoder().encode('no markup');
    const results = runSubstitution(templateFile('lib/{{name}}.ts', content), { name: 'app' }, new Map());

    expect(results).toHaveLength(1);
    expect(results[0]?.path).toBe('lib/app.ts');
    expect(results[0]?.content).toBe(content);
  });

  it('should normalize backslashes in paths', () => {
    const results = runSubstitution(templateFile('lib\\{{name}}.txt', ''), { name: 'app' }, new Map());
    expect(results[0]?.path).toBe('lib/app.txt');
  });

  it('should render partials into expanded content', () => {
    const partials = new Map([['{{~ banner }}', new TextEncoder().encode('** {{a}} **')]]);
    const results = runSubstitution(templateFile('{{#a}}{{{.}}}{{/a}}.md', '{{~ banner }}'), { a: ['one'] }, partials);

    expect(decode(results[0]?.content ?? new Uint8Array())).toBe('** one **');
  });
});

describe('fileContentsEqual', () => {
  it('should compare path and bytes', () => {
    const a = templateFile('a.txt', 'x');
    expect(fileContentsEqual(a, templateFile('a.txt', 'x'))).toBe(true);
    expect(fileContentsEqual(a, templateFile('a.txt', 'y'))).toBe(false);
    expect(fileContentsEqual(a, templateFile('b.txt', 'x'))).toBe(false);
  });
});
