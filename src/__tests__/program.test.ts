import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createProgram } from '../program';
import { CollectionConfigError } from '../errors';
import { formatFontReport, inspectDocument } from '../inspect';
import { parseLayoutDocument } from '../adapters/layout-json';
import annualReport from './fixtures/annual-report.json';

const fixture = fileURLToPath(new URL('./fixtures/annual-report.json', import.meta.url));

function quietProgram() {
  const program = createProgram();
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
  }
  return program;
}

describe('docoutline commands', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'docoutline-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('runs extract over a directory', async () => {
    await quietProgram().parseAsync(['extract', join(root, 'in'), join(root, 'out'), '-c', '2'], { from: 'user' });
    expect(console.log).toHaveBeenCalledWith('0/0 documents processed');
  });

  it('rejects a non-numeric concurrency', async () => {
    await expect(
      quietProgram().parseAsync(['extract', '--concurrency', 'many'], { from: 'user' })
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('rejects an unknown command', async () => {
    await expect(quietProgram().parseAsync(['summarize'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.unknownCommand',
    });
  });

  it('prints a font report for a layout file', async () => {
    await quietProgram().parseAsync(['inspect', fixture, '--pages', '1'], { from: 'user' });
    const expected = formatFontReport(inspectDocument(parseLayoutDocument(annualReport), { pages: 1 }));
    expect(console.log).toHaveBeenCalledWith(expected);
  });

  it('surfaces an invalid collection config', async () => {
    const config = join(root, 'collection.json');
    await writeFile(config, '{}');
    await expect(quietProgram().parseAsync(['collection', config], { from: 'user' })).rejects.toBeInstanceOf(
      CollectionConfigError
    );
  });
});
