/**
 * Conversation Loop：核心状态机，交替执行补全调用与工具调用直至得到最终回答。
 *
 * 状态: AWAITING_MODEL -> MODEL_WANTS_TOOL -> EXECUTING_TOOL -> AWAITING_MODEL ... -> DONE | FAILED
 * 每个模型回合只执行第一个 tool_use 块；非 tool_use 停止原因即结束，
 * 最终文本为响应中所有 text 块按序拼接。DONE / FAILED 为终态。
 *
 * 核心导出:
 * - ConversationLoop: 单次运行的对话循环
 * - ToolDispatcher: 循环所需的最小工具注册表接口
 * - LoopOutcome: 循环结束时的结果
 */

import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  ConversationMessage,
  StopReason,
  TokenUsage,
  ToolDescriptor,
  ToolUseBlock,
} from '../providers/types.ts';
import {
  MaxTurnsExceededError,
  ToolError,
  ToolNotFoundError,
  createChildLogger,
  getErrorMessage,
  throwIfAborted,
  type Logger,
} from '../common/index.ts';
import { serializeToolResult } from '../tools/result-serializer.ts';
import { extractText, findFirstToolUse, toolResultMessage } from './messages.ts';
import {
  LoopState,
  type AgentConfig,
  type LoopEvent,
  type LoopObserver,
} from './types.ts';

/** 对话循环依赖的工具注册表能力 */
export interface ToolDispatcher {
  allTools(): ToolDescriptor[];
  dispatch(name: string, input: Record<string, unknown>): Promise<unknown>;
}

export type LoopSettings = Pick<
  AgentConfig,
  'model' | 'maxTokens' | 'temperature' | 'maxTurns' | 'toolErrorPolicy' | 'systemPrompt'
>;

export interface ConversationLoopOptions {
  provider: CompletionProvider;
  tools: ToolDispatcher;
  settings: LoopSettings;
  logger: Logger;
  observer?: LoopObserver;
  abortSignal?: AbortSignal;
}

export interface LoopOutcome {
  response: string;
  stopReason: StopReason;
  /** 最后一次补全调用的用量 */
  usage: TokenUsage;
  /** 所有补全调用的累计用量 */
  totalUsage: TokenUsage;
  turnCount: number;
  messages: ConversationMessage[];
}

interface ToolOutput {
  output: string;
  isError: boolean;
}

/** 合法的状态迁移 */
const TRANSITIONS: Record<LoopState, readonly LoopState[]> = {
  [LoopState.AWAITING_MODEL]: [LoopState.MODEL_WANTS_TOOL, LoopState.DONE, LoopState.FAILED],
  [LoopState.MODEL_WANTS_TOOL]: [LoopState.EXECUTING_TOOL, LoopState.FAILED],
  [LoopState.EXECUTING_TOOL]: [LoopState.AWAITING_MODEL, LoopState.FAILED],
  [LoopState.DONE]: [],
  [LoopState.FAILED]: [],
};

export class ConversationLoop {
  private state: LoopState = LoopState.AWAITING_MODEL;
  private started = false;
  private turnCount = 0;
  private readonly messages: ConversationMessage[] = [];
  private readonly logger: Logger;

  constructor(private readonly options: ConversationLoopOptions) {
    this.logger = createChildLogger(options.logger, 'conversation-loop');
  }

  getState(): LoopState {
    return this.state;
  }

  /** 当前对话历史的副本 */
  getMessages(): ConversationMessage[] {
    return [...this.messages];
  }

  /**
   * 运行循环直至终态。每个实例只能运行一次。
   * 失败时状态置为 FAILED 并原样抛出错误。
   */
  async run(initialMessages: ConversationMessage[]): Promise<LoopOutcome> {
    if (this.started) {
      throw new Error('ConversationLoop has already been run');
    }
    this.started = true;
    this.messages.push(...initialMessages);

    let outcome: LoopOutcome;
    try {
      outcome = await this.execute();
    } catch (error) {
      this.transition(LoopState.FAILED);
      this.logger.error({ err: error }, 'Conversation loop failed');
      this.emit({ type: 'loop_end', state: LoopState.FAILED, turnCount: this.turnCount });
      throw error;
    }

    this.transition(LoopState.DONE);
    this.emit({ type: 'loop_end', state: LoopState.DONE, turnCount: outcome.turnCount });
    return outcome;
  }

  private async execute(): Promise<LoopOutcome> {
    const { settings, abortSignal } = this.options;
    const catalog = this.options.tools.allTools();
    const totalUsage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

    for (;;) {
      throwIfAborted(abortSignal, 'completion request');
      if (this.turnCount >= settings.maxTurns) {
        throw new MaxTurnsExceededError(settings.maxTurns);
      }

      this.emit({ type: 'turn_start', turnIndex: this.turnCount });
      const response = await this.requestCompletion(catalog);
      this.turnCount += 1;
      totalUsage.inputTokens += response.usage.inputTokens;
      totalUsage.outputTokens += response.usage.outputTokens;

      this.logger.debug(
        { turn: this.turnCount, stopReason: response.stopReason, blocks: response.content.length },
        'Completion received',
      );

      if (response.stopReason !== 'tool_use') {
        return this.finish(response, totalUsage);
      }

      const invocation = findFirstToolUse(response.content);
      if (!invocation) {
        this.logger.warn('Stop reason is tool_use but the response has no tool_use block, finishing early');
        return this.finish(response, totalUsage);
      }

      this.transition(LoopState.MODEL_WANTS_TOOL);
      this.messages.push({ role: 'assistant', content: [...response.content] });

      this.transition(LoopState.EXECUTING_TOOL);
      throwIfAborted(abortSignal, 'tool dispatch');
      const result = await this.executeTool(invocation);
      this.messages.push(toolResultMessage(invocation.id, result.output, result.isError));

      this.transition(LoopState.AWAITING_MODEL);
    }
  }

  private requestCompletion(catalog: ToolDescriptor[]): Promise<CompletionResponse> {
    const { settings, abortSignal } = this.options;
    const request: CompletionRequest = {
      model: settings.model,
      maxTokens: settings.maxTokens,
      temperature: settings.temperature,
      messages: [...this.messages],
      ...(settings.systemPrompt ? { system: settings.systemPrompt } : {}),
      ...(catalog.length > 0 ? { tools: catalog } : {}),
      ...(abortSignal ? { abortSignal } : {}),
    };
    return this.options.provider.createCompletion(request);
  }

  private async executeTool(invocation: ToolUseBlock): Promise<ToolOutput> {
    const startTime = Date.now();
    this.emit({
      type: 'tool_start',
      toolName: invocation.name,
      toolId: invocation.id,
      input: invocation.input,
    });
    this.logger.info({ tool: invocation.name, toolId: invocation.id }, 'Dispatching tool call');

    let result: ToolOutput;
    try {
      const value = await this.options.tools.dispatch(invocation.name, invocation.input);
      result = { output: serializeToolResult(value), isError: false };
    } catch (error) {
      if (!(error instanceof ToolError) || this.options.settings.toolErrorPolicy === 'fail') {
        this.emitToolEnd(invocation, startTime, { output: getErrorMessage(error), isError: true });
        throw error;
      }
      this.logger.warn({ tool: invocation.name, err: error }, 'Tool call failed, reporting error to the model');
      result = { output: describeToolFailure(error), isError: true };
    }

    this.emitToolEnd(invocation, startTime, result);
    return result;
  }

  private finish(response: CompletionResponse, totalUsage: TokenUsage): LoopOutcome {
    return {
      response: extractText(response.content),
      stopReason: response.stopReason,
      usage: { ...response.usage },
      totalUsage: { ...totalUsage },
      turnCount: this.turnCount,
      messages: [...this.messages],
    };
  }

  private transition(next: LoopState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid loop transition: ${this.state} -> ${next}`);
    }
    this.state = next;
  }

  private emitToolEnd(invocation: ToolUseBlock, startTime: number, result: ToolOutput): void {
    this.emit({
      type: 'tool_end',
      toolName: invocation.name,
      toolId: invocation.id,
      output: result.output,
      isError: result.isError,
      duration: Date.now() - startTime,
    });
  }

  private emit(event: LoopEvent): void {
    this.options.observer?.(event);
  }
}

/** report 策略下回传给模型的错误文本 */
export function describeToolFailure(error: ToolError): string {
  if (!(error instanceof ToolNotFoundError) || error.attempts.length === 0) {
    return `Error: ${error.message}`;
  }
  const lines = error.attempts.map((attempt) => `- ${attempt.provider} (${attempt.outcome}): ${attempt.message}`);
  return [`Error: ${error.message}`, ...lines].join('\n');
}
