/**
 * Agent Processor
 *
 * Runs the tool-calling loop for one request: call the model, execute the
 * calls it asks for in order, feed the results back, stop when it answers.
 */

import { createLogger, errorMessage, type Logger } from '../logging';
import type { ChatMessage, LLMResponse } from '../model-adapter/types';
import { DocumentProvider } from '../tool-executor/document-provider';
import { createDocumentToolExecutor, type ToolExecutor } from '../tool-executor/ToolExecutor';
import { toPayload } from '../tool-executor/context';
import type {
  AgentEvent,
  AgentProcessorConfig,
  AgentProcessorOptions,
  AgentRequest,
  AgentResult,
  ChatClient,
  ToolCallRecord,
} from './types';
import { AgentStateMachine } from './state-machine';
import { ToolCallParser } from './tool-parser';
import { generateRunId, generateSessionId } from './run-id-generator';
import { buildAgentSystemPrompt, DEFAULT_AGENT_PROMPT } from './system-prompt';

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_AGENT_CONFIG: AgentProcessorConfig = {
  maxIterations: 10,
  documentPreviewLength: 3000,
  systemPrompt: DEFAULT_AGENT_PROMPT,
  toolTimeoutMs: 30000,
};

const COMPLETED_MESSAGE = 'Done.';
const LENGTH_MESSAGE = 'The reply hit the length limit before it was finished. Try a shorter or simpler request.';
const MAX_ITERATIONS_MESSAGE = 'Stopped after too many steps without finishing. Try simplifying the request.';

// ============================================================================
// Run State
// ============================================================================

interface Run {
  runId: string;
  sessionId: string;
  document: DocumentProvider;
  executor: ToolExecutor;
  machine: AgentStateMachine;
  messages: ChatMessage[];
  toolCalls: ToolCallRecord[];
  totalTokens: number;
  lastContent: string;
}

// ============================================================================
// Agent Processor
// ============================================================================

export class AgentProcessor {
  private config: AgentProcessorConfig;
  private logger: Logger;
  private parser = new ToolCallParser();

  constructor(
    private readonly llm: ChatClient,
    options: AgentProcessorOptions = {}
  ) {
    this.config = { ...DEFAULT_AGENT_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('agent-loop');
  }

  getConfig(): AgentProcessorConfig {
    return { ...this.config };
  }

  /**
   * Run to completion and return the result
   */
  async process(request: AgentRequest): Promise<AgentResult> {
    let result: AgentResult | null = null;

    for await (const event of this.processStream(request)) {
      if (event.type === 'done') {
        result = event.result;
      }
    }

    if (!result) {
      throw new Error('Agent run ended without a result');
    }
    return result;
  }

  /**
   * Run the loop, yielding progress events. The last event is always `done`.
   */
  async *processStream(request: AgentRequest): AsyncGenerator<AgentEvent> {
    const run = this.startRun(request);
    const tools = run.executor.getForModel();
    const log = this.logger.child(run.runId);

    log.info('Agent run started', {
      sessionId: run.sessionId,
      maxIterations: this.config.maxIterations,
      hasDocument: Boolean(request.documentContent),
    });

    while (run.machine.beginIteration()) {
      const iteration = run.machine.iterations;
      yield { type: 'thinking', iteration };

      let response: LLMResponse;
      try {
        response = await this.llm.chat({
          messages: run.messages,
          tools,
          temperature: this.config.temperature,
          maxTokens: this.config.maxTokens,
          signal: request.signal,
        });
      } catch (error) {
        const detail = errorMessage(error);
        log.error('Model call failed', { iteration, error: detail });

        run.machine.transition('done');
        yield { type: 'error', error: detail };
        yield this.done(run, {
          success: false,
          message: `The assistant could not finish the request: ${detail}`,
          error: 'llm_error',
          errorDetail: detail,
        });
        return;
      }

      run.totalTokens += response.usage.totalTokens;
      if (response.content.trim() !== '') {
        run.lastContent = response.content;
      }

      log.debug('Model turn', {
        iteration,
        finishReason: response.finishReason,
        toolCalls: response.toolCalls.length,
      });

      if (response.finishReason === 'length') {
        run.machine.transition('done');
        if (response.content) {
          yield { type: 'text', content: response.content };
        }
        yield this.done(run, {
          success: false,
          message: response.content || LENGTH_MESSAGE,
          error: 'length_exceeded',
        });
        return;
      }

      const calls = this.parser.parse(response, iteration);

      if (run.machine.next(response.finishReason, calls.length > 0) === 'done') {
        run.machine.transition('done');
        run.messages.push({ role: 'assistant', content: response.content });
        yield { type: 'text', content: response.content };
        yield this.done(run, {
          success: true,
          message: response.content.trim() !== '' ? response.content : COMPLETED_MESSAGE,
        });
        return;
      }

      run.machine.transition('executing_tools');
      if (response.content) {
        yield { type: 'text', content: response.content };
      }

      run.messages.push({
        role: 'assistant',
        content: response.content,
        toolCalls: calls.map(call => ({ id: call.id, name: call.name, arguments: call.arguments })),
      });

      // Sequential: later calls may depend on the buffer changes of earlier ones
      for (const call of calls) {
        run.toolCalls.push(call);
        yield { type: 'tool_call', id: call.id, name: call.name, arguments: call.arguments };

        call.status = 'running';
        const result = await run.executor.execute(
          call.name,
          call.arguments,
          run.executor.createContext({
            sessionId: run.sessionId,
            runId: run.runId,
            toolCallId: call.id,
            signal: request.signal,
            logger: log,
          })
        );

        const payload = toPayload(result);
        call.status = result.success ? 'completed' : 'error';
        call.result = payload;
        if (!result.success) {
          call.error = result.error?.message;
        }

        yield { type: 'tool_result', id: call.id, name: call.name, result };

        run.messages.push({
          role: 'tool',
          content: JSON.stringify(payload),
          toolCallId: call.id,
          name: call.name,
        });
      }

      run.machine.transition('awaiting_model');
    }

    log.warn('Iteration limit reached', { maxIterations: this.config.maxIterations });

    run.machine.transition('done');
    yield this.done(run, {
      success: false,
      message: run.lastContent || MAX_ITERATIONS_MESSAGE,
      error: 'max_iterations_exceeded',
    });
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private startRun(request: AgentRequest): Run {
    const document = new DocumentProvider(request.documentContent ?? '', request.documentId ?? null);
    const executor = createDocumentToolExecutor(document, {
      defaultTimeout: this.config.toolTimeoutMs ?? DEFAULT_AGENT_CONFIG.toolTimeoutMs,
    });

    const systemPrompt = buildAgentSystemPrompt({
      basePrompt: this.config.systemPrompt,
      toolsPrompt: executor.buildToolsPrompt(),
      documentContent: request.documentContent,
      documentPreviewLength: this.config.documentPreviewLength,
      selectedText: request.selectedText,
      ragContext: request.ragContext,
    });

    return {
      runId: generateRunId(),
      sessionId: request.sessionId ?? generateSessionId(),
      document,
      executor,
      machine: new AgentStateMachine(this.config.maxIterations),
      messages: [
        { role: 'system', content: systemPrompt },
        ...(request.history ?? []),
        { role: 'user', content: request.message },
      ],
      toolCalls: [],
      totalTokens: 0,
      lastContent: '',
    };
  }

  private done(
    run: Run,
    outcome: Pick<AgentResult, 'success' | 'message' | 'error' | 'errorDetail'>
  ): AgentEvent {
    const modifiedContent = run.document.getModifiedContent();

    const result: AgentResult = {
      ...outcome,
      toolCalls: run.toolCalls,
      iterations: run.machine.iterations,
      totalTokens: run.totalTokens,
      sessionId: run.sessionId,
      runId: run.runId,
      edits: run.document.getEdits(),
      ...(modifiedContent !== null ? { modifiedContent } : {}),
    };

    this.logger.info('Agent run finished', {
      runId: run.runId,
      success: result.success,
      iterations: result.iterations,
      toolCalls: result.toolCalls.length,
      error: result.error,
    });

    return { type: 'done', result };
  }
}
