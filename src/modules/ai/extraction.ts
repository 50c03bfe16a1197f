import { z } from 'zod';
import { createModuleLogger } from '../../utils/logger';
import { extractJson } from '../../utils/json';
import { contextToPromptText } from '../context/model';
import { AssistedExtraction } from '../context/extractor';
import { BrandTone, CampaignGoal, Platform, ContextUpdate } from '../context/types';
import { LLMClient } from './client';
import { SYSTEM_PROMPT, buildExtractionPrompt } from './prompts';

const logger = createModuleLogger('assisted-extraction');

const text = z.string().trim().min(1);
const list = z.array(text);

// Unknown keys are dropped; a wrong-typed key fails the whole update
const assistedUpdateSchema = z
  .object({
    targetAudience: text,
    brandTone: z.nativeEnum(BrandTone),
    campaignGoals: z.array(z.nativeEnum(CampaignGoal)),
    preferredPlatforms: z.array(z.nativeEnum(Platform)),
    productDetails: text,
    competitors: list,
    trendingKeywords: list,
    productReferences: list,
    keyMessages: list,
    budget: text,
    timeline: text,
    uniqueSellingPoints: list,
  })
  .partial();

export function parseAssistedUpdate(output: string): ContextUpdate {
  const extraction = extractJson(output);
  if (!extraction.found) {
    return {};
  }

  const parsed = assistedUpdateSchema.safeParse(extraction.value);
  if (!parsed.success) {
    logger.debug('Assisted extraction returned an unusable shape', {
      issues: parsed.error.issues.length,
    });
    return {};
  }

  return parsed.data;
}

/**
 * Build the model-backed extraction step; any failure yields an empty update
 */
export function createAssistedExtraction(llm: LLMClient): AssistedExtraction {
  return async (message, context) => {
    const result = await llm.chat(
      SYSTEM_PROMPT,
      [{ role: 'user', content: buildExtractionPrompt(message, contextToPromptText(context)) }],
      { task: 'extract-context', temperature: 0 }
    );

    if (!result.ok) {
      logger.warn('Assisted extraction skipped', { kind: result.error.kind });
      return {};
    }

    return parseAssistedUpdate(result.value);
  };
}
