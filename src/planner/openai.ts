/**
 * OpenAI Plan Generator
 *
 * Asks an OpenAI-compatible chat endpoint (LM Studio by default) for a plan
 * and returns the JSON it finds in the reply. The reply is untrusted; the
 * pipeline parses and validates it.
 *
 * An optional context provider (the running apps, from the CLI) is appended
 * to the user message so the model can name targets exactly. If it fails,
 * the request goes out without it.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import OpenAI from 'openai';
import { extractJson } from '../core/plan.js';
import { GenerationError, errorMessage } from '../core/errors.js';
import { logTag } from '../core/log.js';
import type { PlanGenerator } from '../core/pipeline.js';

export const DEFAULT_PROMPT_PATH = fileURLToPath(new URL('../../prompts/planner.md', import.meta.url));

export interface OpenAIPlannerOptions {
  baseURL: string;
  model: string;
  /** Local servers ignore the key, but the client requires one. */
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
  promptPath?: string;
  now?: () => Date;
  context?: () => Promise<string | undefined>;
}

export class OpenAIPlanGenerator implements PlanGenerator {
  name = 'openai';
  private client: OpenAI;
  private systemPrompt?: string;

  constructor(private options: OpenAIPlannerOptions) {
    this.client = new OpenAI({
      baseURL: options.baseURL,
      apiKey: options.apiKey || 'lm-studio',
      maxRetries: 0,
    });
  }

  async generate(rawInput: string): Promise<unknown> {
    const now = this.options.now?.() ?? new Date();
    const context = await this.readContext();
    let userContent = `CURRENT DATE: ${now.toISOString().slice(0, 10)}\n\n${rawInput}`;
    if (context) {
      userContent += `\n\n[System Context]\n${context}`;
    }

    let content: string;
    try {
      const res = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: this.loadPrompt() },
          { role: 'user', content: userContent },
        ],
        max_tokens: this.options.maxTokens ?? 512,
        temperature: this.options.temperature ?? 0,
      });
      content = res.choices[0]?.message?.content ?? '';
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      throw new GenerationError(`Planner request failed: ${errorMessage(err)}`);
    }

    return extractJson(content);
  }

  private async readContext(): Promise<string | undefined> {
    if (!this.options.context) return undefined;
    try {
      return await this.options.context();
    } catch (err) {
      logTag('planner', `Planning without context: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private loadPrompt(): string {
    if (this.systemPrompt === undefined) {
      const promptPath = this.options.promptPath ?? DEFAULT_PROMPT_PATH;
      try {
        this.systemPrompt = fs.readFileSync(promptPath, 'utf-8');
      } catch (err) {
        throw new GenerationError(`Could not read planner prompt ${promptPath}: ${errorMessage(err)}`);
      }
    }
    return this.systemPrompt;
  }
}
