import OpenAI from 'openai';
import { zodResponseFormat } from 'openai/helpers/zod';
import { z } from 'zod';

/**
 * A chat model that answers with JSON matching a zod schema
 */
export interface StructuredCompletionClient {
  complete<T extends z.ZodTypeAny>(prompt: string, schema: T, schemaName: string): Promise<z.infer<T>>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class OpenAIStructuredClient implements StructuredCompletionClient {
  private client: OpenAI;

  constructor(private options: OpenAIClientOptions) {
    // Retries are handled per stage
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete<T extends z.ZodTypeAny>(
    prompt: string,
    schema: T,
    schemaName: string
  ): Promise<z.infer<T>> {
    const completion = await this.client.beta.chat.completions.parse({
      model: this.options.model,
      messages: [{ role: 'user', content: prompt }],
      response_format: zodResponseFormat(schema, schemaName),
    });

    const message = completion.choices[0]?.message;
    if (message?.refusal) {
      throw new Error(`Model refused ${schemaName}: ${message.refusal}`);
    }
    if (!message?.parsed) {
      throw new Error(`Model returned no ${schemaName} payload`);
    }
    return schema.parse(message.parsed);
  }
}
