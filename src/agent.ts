import { Dispatcher, type DispatchListener, type DispatchResult } from "./dispatch.ts";
import { createEventReporter, type Logger } from "./logger.ts";
import type { ToolRegistry } from "./registry.ts";
import { Session } from "./session.ts";
import type { ChatAdapter, Message } from "./types.ts";

export type AgentOptions = {
  adapter: ChatAdapter;
  registry: ToolRegistry;
  systemPrompt?: string;
  maxToolRounds?: number;
  requestTimeoutMs?: number;
  retries?: number;
  /** Used by `interact` only. */
  logger?: Logger;
  verbose?: boolean;
};

export class Agent {
  readonly session = new Session();
  private dispatcher: Dispatcher;
  private logger?: Logger;
  private verbose: boolean;
  // Interactions on one session run strictly one after another.
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: AgentOptions) {
    this.dispatcher = new Dispatcher({
      adapter: options.adapter,
      registry: options.registry,
      systemPrompt: options.systemPrompt,
      maxToolRounds: options.maxToolRounds,
      requestTimeoutMs: options.requestTimeoutMs,
      retries: options.retries,
    });
    this.logger = options.logger;
    this.verbose = options.verbose === true;
  }

  /** Answers the prompt, reporting progress and the answer through the logger. */
  async interact(prompt: string, signal?: AbortSignal): Promise<string> {
    const logger = this.logger;
    if (!logger) return this.interactFunctional(prompt, signal);
    const reporter = createEventReporter(logger, { verbose: this.verbose });
    const result = await this.run(prompt, signal, reporter.onEvent);
    await reporter.flush();
    logger.human({ body: result.answer, variant: "agent" });
    return result.answer;
  }

  /** Answers the prompt without any terminal output. */
  async interactFunctional(prompt: string, signal?: AbortSignal): Promise<string> {
    const result = await this.run(prompt, signal);
    return result.answer;
  }

  history(): Message[] {
    return this.session.snapshot();
  }

  private run(prompt: string, signal?: AbortSignal, onEvent?: DispatchListener): Promise<DispatchResult> {
    const next = this.queue.then(async () => {
      const result = await this.dispatcher.dispatch(prompt, this.session.messages, { signal, onEvent });
      this.session.merge(result.messages);
      return result;
    });
    this.queue = next.catch(() => undefined);
    return next;
  }
}
