import { Agent, run } from '@openai/agents';

/**
 * A single-shot text model: one prompt in, one reply out
 */
export interface TextCompletion {
  complete(prompt: string): Promise<string>;
}

export interface AgentCompletionConfig {
  name: string;
  instructions: string;
  model: string;
  temperature: number;
}

/**
 * TextCompletion backed by a tool-less agent from the OpenAI Agents SDK
 */
export class AgentTextCompletion implements TextCompletion {
  private agent: Agent;

  constructor(config: AgentCompletionConfig) {
    this.agent = new Agent({
      name: config.name,
      instructions: config.instructions,
      model: config.model,
      modelSettings: { temperature: config.temperature }
    });
  }

  async complete(prompt: string): Promise<string> {
    const result = await run(this.agent, prompt);
    return result.finalOutput ?? '';
  }
}
