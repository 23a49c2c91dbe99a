import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { Workspace } from '../../src/core/workspace.js';
import { buildSkillsContext, extractFrontmatterName, findSkillFiles } from '../../src/personas/skill-loader.js';
import { cleanupTrees, makeTree } from '../helpers.js';

afterEach(cleanupTrees);

describe('extractFrontmatterName', () => {
  it('reads the name key', () => {
    expect(extractFrontmatterName('---\nname: pdf-tools\ndescription: x\n---\n# Body')).toBe('pdf-tools');
  });

  it('accepts CRLF line endings and any key case', () => {
    expect(extractFrontmatterName('---\r\nName: csv-report\r\n---\r\nbody')).toBe('csv-report');
  });

  it('strips double quotes, then single quotes', () => {
    expect(extractFrontmatterName('---\nname: "quoted"\n---')).toBe('quoted');
    expect(extractFrontmatterName(`---\nname: "'both'"\n---`)).toBe('both');
  });

  it('keeps text after the first colon', () => {
    expect(extractFrontmatterName('---\nname: tools: extra\n---')).toBe('tools: extra');
  });

  it('returns empty without an exact opening delimiter', () => {
    expect(extractFrontmatterName('# Title\n---\nname: x\n---')).toBe('');
    expect(extractFrontmatterName('----\nname: x\n---')).toBe('');
    expect(extractFrontmatterName('')).toBe('');
  });

  it('returns empty for a well-formed block without a name', () => {
    expect(extractFrontmatterName('---\ndescription: no name here\n---\nbody')).toBe('');
  });

  it('returns empty for an unclosed block', () => {
    expect(extractFrontmatterName('---\nname: dangling\nbody')).toBe('');
  });

  it('only looks for the closing delimiter in the first 2000 lines', () => {
    const filler = (count: number) => Array.from({ length: count }, () => 'x: y');
    const closesInside = ['---', 'name: inside', ...filler(1997), '---'].join('\n');
    const closesOutside = ['---', 'name: outside', ...filler(1998), '---'].join('\n');

    expect(extractFrontmatterName(closesInside)).toBe('inside');
    expect(extractFrontmatterName(closesOutside)).toBe('');
  });
});

describe('findSkillFiles', () => {
  it('finds SKILL.md in any case, recursively and sorted', async () => {
    const root = await makeTree({
      'skills/b/SKILL.md': 'b',
      'skills/a/skill.md': 'a',
      'skills/a/nested/Skill.MD': 'nested',
      'skills/a/README.md': 'ignored',
    });

    const found = await findSkillFiles(join(root, 'skills'));
    expect(found).toEqual([
      join(root, 'skills', 'a', 'nested', 'Skill.MD'),
      join(root, 'skills', 'a', 'skill.md'),
      join(root, 'skills', 'b', 'SKILL.md'),
    ]);
  });
});

describe('buildSkillsContext', () => {
  const alpha = '---\nname: alpha\n---\nUse alpha for A tasks.';
  const beta = '---\nname: beta\n---\nUse beta for B tasks.';

  it('wraps each skill in markers naming it and its path', async () => {
    const ws = new Workspace(await makeTree({ 'skills/alpha/SKILL.md': alpha, 'skills/beta/SKILL.md': beta }));
    const context = await buildSkillsContext(ws, 'skills/', 100_000);

    expect(context.chunks.map(chunk => chunk.path)).toEqual(['skills/alpha/SKILL.md', 'skills/beta/SKILL.md']);
    expect(context.chunks[0].displayName).toBe('alpha');
    expect(context.text).toContain(
      `\n\n===== SKILL START: alpha | skills/alpha/SKILL.md =====\n${alpha}\n===== SKILL END: alpha | skills/alpha/SKILL.md =====\n`
    );
    expect(context.metadata).toEqual([
      { path: 'skills/alpha/SKILL.md', name: 'alpha' },
      { path: 'skills/beta/SKILL.md', name: 'beta' },
    ]);
  });

  it('uses a quoted frontmatter name in the markers and metadata', async () => {
    const foo = '---\nname: "Foo Skill"\n---\nDo foo things.';
    const ws = new Workspace(await makeTree({ 'skills/foo/SKILL.md': foo }));
    const context = await buildSkillsContext(ws, 'skills/', 100_000);

    expect(context.text).toContain(
      `===== SKILL START: Foo Skill | skills/foo/SKILL.md =====\n${foo}\n===== SKILL END: Foo Skill | skills/foo/SKILL.md =====`
    );
    expect(context.metadata).toEqual([{ path: 'skills/foo/SKILL.md', name: 'Foo Skill' }]);
  });

  it('labels skills without a frontmatter name as unnamed', async () => {
    const ws = new Workspace(await makeTree({ 'skills/plain/SKILL.md': '# No frontmatter' }));
    const context = await buildSkillsContext(ws, 'skills');

    expect(context.text).toContain('===== SKILL START: (unnamed) | skills/plain/SKILL.md =====');
    expect(context.metadata).toEqual([{ path: 'skills/plain/SKILL.md', name: '' }]);
  });

  it('drops skills past the budget from the text but still lists them', async () => {
    const ws = new Workspace(await makeTree({ 'skills/alpha/SKILL.md': alpha, 'skills/beta/SKILL.md': beta }));
    const full = await buildSkillsContext(ws, 'skills/', 100_000);
    const budget = full.text.length - 1;

    const cut = await buildSkillsContext(ws, 'skills/', budget);

    expect(cut.chunks.map(chunk => chunk.path)).toEqual(['skills/alpha/SKILL.md']);
    expect(cut.text.length).toBeLessThanOrEqual(budget);
    expect(full.text.startsWith(cut.text)).toBe(true);
    expect(cut.metadata.map(entry => entry.name)).toEqual(['alpha', 'beta']);
  });

  it('is empty when the skills directory is missing or outside the workspace', async () => {
    const ws = new Workspace(await makeTree({ 'README.md': 'x' }));

    await expect(buildSkillsContext(ws, 'skills/')).resolves.toEqual({ text: '', chunks: [], metadata: [] });
    await expect(buildSkillsContext(ws, '../elsewhere')).resolves.toEqual({ text: '', chunks: [], metadata: [] });
  });
});
