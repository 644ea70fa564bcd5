import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CardStore } from './card-store';
import { IssueReporter } from './issues';
import { NotFoundError, ValidationError } from '../errors';
import { createTestDatabase, fixedClock, sequentialIds } from '../test/fixtures';

describe('IssueReporter', () => {
  let dataDir: string;
  let store: CardStore;
  let reporter: IssueReporter;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'vocab-drill-issues-'));
    store = new CardStore(createTestDatabase(), {
      clock: fixedClock('2026-03-01T09:00:00.000Z').now,
      generateId: sequentialIds(),
    });
    reporter = new IssueReporter(store, join(dataDir, 'nested'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('appends one JSON line per report', async () => {
    const { card } = await store.create({ text: 'de kat', translation: 'the dog' });

    await reporter.report(card.id, '  wrong translation ');
    await reporter.report(card.id);

    const contents = await readFile(join(dataDir, 'nested', 'reported_issues.jsonl'), 'utf8');
    expect(contents.split('\n')).toEqual([
      '{"card_id":"id-2","word_id":"id-1","text":"de kat","translation":"the dog","note":"wrong translation","reported_at":"2026-03-01T09:00:00.000Z"}',
      '{"card_id":"id-2","word_id":"id-1","text":"de kat","translation":"the dog","note":null,"reported_at":"2026-03-01T09:00:00.000Z"}',
      '',
    ]);
  });

  it('records the word id and report time it is given', async () => {
    const { card } = await store.create({ text: 'de kat' });

    const report = await reporter.report(card.id, null, { wordId: 'id-1', reportedAt: '2026-02-28T11:00:00+01:00' });

    expect(report).toEqual({
      card_id: 'id-2',
      word_id: 'id-1',
      text: 'de kat',
      translation: null,
      note: null,
      reported_at: '2026-02-28T10:00:00.000Z',
    });
  });

  it('rejects a word id that does not match the card', async () => {
    const { card } = await store.create({ text: 'de kat' });

    await expect(reporter.report(card.id, 'typo', { wordId: 'other' })).rejects.toMatchObject({
      issues: ['word_id: card id-2 belongs to word id-1'],
    });
    await expect(readFile(reporter.path, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('rejects unknown cards without writing', async () => {
    await expect(reporter.report('missing', 'typo')).rejects.toBeInstanceOf(NotFoundError);
    await expect(readFile(reporter.path, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('rejects overly long notes', async () => {
    const { card } = await store.create({ text: 'de kat' });
    await expect(reporter.report(card.id, 'x'.repeat(2001))).rejects.toBeInstanceOf(ValidationError);
  });
});
