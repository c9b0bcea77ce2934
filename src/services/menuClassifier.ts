/**
 * Menu classification through Google Gemini
 * Turns a menu name into a category and per-serving nutrition facts
 */

import { GoogleGenAI } from '@google/genai';
import { ClassificationFailure } from './errors.js';
import { parseModelJson } from './modelJson.js';
import { parseNutrition } from '../utils/validation.js';
import type { Classification, MenuClassifier } from '../types/index.js';

interface GenerateContentRequest {
  model: string;
  contents: string;
  config: {
    systemInstruction: string;
    temperature: number;
    maxOutputTokens: number;
    responseMimeType: string;
  };
}

interface AIResponse {
  text?: string;
}

export interface AIClient {
  models: {
    generateContent(request: GenerateContentRequest): Promise<AIResponse>;
  };
}

export const CLASSIFY_INSTRUCTION = [
  'Classify the menu item given by the user for a school or office lunch plan.',
  'Respond with a single JSON object only, no markdown:',
  '{"category": "Soup" | "Main" | "Side" | "Other",',
  ' "nutrition": {"calories": 0, "protein": 0, "fat": 0, "carbs": 0, "sodium": 0}}',
  'Nutrition is for one standard serving: calories in kcal, protein/fat/carbs in grams, sodium in mg.',
  'All numbers must be integers.',
].join('\n');

export const createAIClient = (apiKey: string): AIClient => new GoogleGenAI({ apiKey });

const statusOf = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
};

/**
 * Validate the parsed model output; returns the problem as a string when invalid
 */
export function toClassification(value: unknown): Classification | string {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return 'response is not an object';
  }

  const category = 'category' in value && typeof value.category === 'string' ? value.category.trim() : '';
  if (!category) return 'missing category';

  const nutrition = parseNutrition('nutrition' in value ? value.nutrition : undefined);
  if (typeof nutrition === 'string') return nutrition;

  return { category, nutrition };
}

export interface GeminiClassifierOptions {
  model: string;
  temperature?: number;
}

export class GeminiMenuClassifier implements MenuClassifier {
  private readonly ai: AIClient;
  private readonly model: string;
  private readonly temperature: number;

  constructor(ai: AIClient, options: GeminiClassifierOptions) {
    this.ai = ai;
    this.model = options.model;
    this.temperature = options.temperature ?? 0.3;
  }

  async classify(menuName: string): Promise<Classification> {
    let response: AIResponse;
    try {
      response = await this.ai.models.generateContent({
        model: this.model,
        contents: menuName,
        config: {
          systemInstruction: CLASSIFY_INSTRUCTION,
          temperature: this.temperature,
          maxOutputTokens: 500,
          responseMimeType: 'application/json',
        },
      });
    } catch (error) {
      const status = statusOf(error);
      const reason = status === 401 || status === 403 ? 'auth' : 'service';
      const message = error instanceof Error ? error.message : 'request failed';
      throw new ClassificationFailure(menuName, reason, message, { cause: error });
    }

    const raw = response.text ?? '';
    if (!raw.trim()) {
      throw new ClassificationFailure(menuName, 'malformed', 'empty response');
    }

    const parsed = parseModelJson(raw);
    if (!parsed.ok) {
      throw new ClassificationFailure(menuName, 'malformed', parsed.error);
    }

    const result = toClassification(parsed.value);
    if (typeof result === 'string') {
      throw new ClassificationFailure(menuName, 'malformed', result);
    }
    return result;
  }
}

/**
 * Stand-in used when no API key is configured
 */
export class UnconfiguredClassifier implements MenuClassifier {
  async classify(menuName: string): Promise<Classification> {
    throw new ClassificationFailure(menuName, 'auth', 'GEMINI_API_KEY is not configured');
  }
}
