import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { ValidationError } from '../errors';
import type { IssueReport } from '../types';
import type { CardStore } from './card-store';

export const ISSUES_FILE = 'reported_issues.jsonl';

export interface ReportDetails {
  wordId?: string;
  reportedAt?: string;
}

/**
 * Appends learner feedback about a card to a JSON Lines file in the data
 * directory. Reports are never read back by the engine itself.
 */
export class IssueReporter {
  readonly path: string;

  constructor(private readonly store: CardStore, dataDir: string) {
    this.path = join(dataDir, ISSUES_FILE);
  }

  /**
   * `details.wordId`, when given, must be the card's word. `details.reportedAt`
   * defaults to the store clock.
   */
  async report(cardId: string, note?: string | null, details: ReportDetails = {}): Promise<IssueReport> {
    const { card, word } = await this.store.getCard(cardId);
    const trimmedNote = note?.trim() ?? '';

    const issues: string[] = [];
    if (trimmedNote.length > 2000) {
      issues.push('note: at most 2000 characters');
    }
    if (details.wordId !== undefined && details.wordId !== word.id) {
      issues.push(`word_id: card ${card.id} belongs to word ${word.id}`);
    }
    const reportedAt = details.reportedAt === undefined ? this.store.now().getTime() : Date.parse(details.reportedAt);
    if (Number.isNaN(reportedAt)) {
      issues.push('reported_at: must be a timestamp');
    }
    if (issues.length > 0) {
      throw new ValidationError('Invalid issue report', issues);
    }

    const report: IssueReport = {
      card_id: card.id,
      word_id: word.id,
      text: word.text,
      translation: word.translation,
      note: trimmedNote === '' ? null : trimmedNote,
      reported_at: new Date(reportedAt).toISOString(),
    };

    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${JSON.stringify(report)}\n`, 'utf8');
    console.log('[issues] reported card', card.id);
    return report;
  }
}
