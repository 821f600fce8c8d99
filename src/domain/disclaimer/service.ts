import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Disclaimer, DisclaimerTracking, Language, RiskLevel } from '../../shared/types';
import { AppError, errorMessage } from '../../shared/errors';
import { createChildLogger } from '../../infra/logging/logger';
import type { DisclaimerHistoryEntry, DisclaimerRepository } from './repository';

const log = createChildLogger({ component: 'disclaimer-selector' });

const textsByLanguage = z.object({ en: z.string().min(1) }).catchall(z.string().min(1));

const defaultsSchema = z.object({
  low: textsByLanguage,
  medium: textsByLanguage,
  high: textsByLanguage,
  critical: textsByLanguage,
});

export type DefaultDisclaimers = z.infer<typeof defaultsSchema>;

export const DEFAULT_DISCLAIMERS_PATH = path.join(__dirname, '..', '..', '..', 'data', 'disclaimers.json');

export function loadDefaultDisclaimers(filePath: string = DEFAULT_DISCLAIMERS_PATH): DefaultDisclaimers {
  return defaultsSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
}

export class DisclaimerSelector {
  /** Concurrent first lookups of a pair share one resolution. */
  private inFlight = new Map<string, Promise<Disclaimer>>();

  constructor(
    private repository: DisclaimerRepository,
    private defaults: DefaultDisclaimers = loadDefaultDisclaimers()
  ) {}

  getDisclaimer(riskLevel: RiskLevel, language: Language): Promise<Disclaimer> {
    const key = `${riskLevel}:${language}`;
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const lookup = this.resolve(riskLevel, language).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, lookup);
    return lookup;
  }

  defaultText(riskLevel: RiskLevel, language: Language): string {
    const texts = this.defaults[riskLevel];
    return texts[language] ?? texts.en;
  }

  /**
   * Record that a user was shown a disclaimer. Never throws; returns null
   * when the record could not be written.
   */
  async trackShown(
    userId: string,
    disclaimerId: number,
    context: Record<string, unknown> = {},
    messageId: string | null = null
  ): Promise<DisclaimerTracking | null> {
    try {
      return await this.repository.track({ userId, disclaimerId, messageId, context });
    } catch (error) {
      log.error({ userId, disclaimerId, messageId, error: errorMessage(error) }, 'Failed to track disclaimer');
      return null;
    }
  }

  async createCustomDisclaimer(
    riskLevel: RiskLevel,
    language: Language,
    content: string,
    priority: number = 10
  ): Promise<Disclaimer> {
    const created = await this.repository.create({ riskLevel, language, content, priority });
    log.info({ disclaimerId: created.id, riskLevel, language, priority }, 'Custom disclaimer created');
    return created;
  }

  getUserHistory(userId: string, limit: number = 50): Promise<DisclaimerHistoryEntry[]> {
    return this.repository.listHistory(userId, limit);
  }

  private async resolve(riskLevel: RiskLevel, language: Language): Promise<Disclaimer> {
    const existing = await this.repository.findActive(riskLevel, language);
    if (existing) return existing;

    await this.repository.insertDefaultIfAbsent(riskLevel, language, this.defaultText(riskLevel, language));

    const created = await this.repository.findActive(riskLevel, language);
    if (!created) {
      throw new AppError(`No disclaimer available for ${riskLevel}/${language}`, 500, 'DISCLAIMER_UNAVAILABLE');
    }

    log.info({ riskLevel, language, disclaimerId: created.id }, 'Default disclaimer created');
    return created;
  }
}
