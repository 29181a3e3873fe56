/**
 * State Machine and Parser Tests
 */

import { AgentStateMachine } from '../state-machine';
import { ToolCallParser } from '../tool-parser';
import { generateRunId, generateSessionId, parseId, isValidRunId } from '../run-id-generator';
import { buildAgentSystemPrompt } from '../system-prompt';
import type { LLMResponse, ModelToolCall } from '../../model-adapter/types';

function response(toolCalls: ModelToolCall[]): LLMResponse {
  return {
    content: '',
    model: 'test',
    provider: 'test',
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    finishReason: 'tool_calls',
    toolCalls,
    latencyMs: 0,
  };
}

describe('AgentStateMachine', () => {
  let machine: AgentStateMachine;

  beforeEach(() => {
    machine = new AgentStateMachine(2);
  });

  describe('State Transitions', () => {
    it('should start awaiting the model', () => {
      expect(machine.state).toBe('awaiting_model');
      expect(machine.iterations).toBe(0);
    });

    it('should allow the loop transitions', () => {
      expect(machine.canTransition('awaiting_model', 'executing_tools')).toBe(true);
      expect(machine.canTransition('executing_tools', 'awaiting_model')).toBe(true);
      expect(machine.canTransition('awaiting_model', 'done')).toBe(true);
    });

    it('should throw on invalid transition', () => {
      machine.transition('done');
      expect(() => machine.transition('awaiting_model'))
        .toThrow('Invalid state transition: done -> awaiting_model');
      expect(machine.isFinal()).toBe(true);
    });
  });

  describe('Iterations', () => {
    it('should count iterations from one and stop at the limit', () => {
      expect(machine.beginIteration()).toBe(true);
      expect(machine.iterations).toBe(1);

      machine.transition('executing_tools');
      // No new model call while tools run
      expect(machine.beginIteration()).toBe(false);

      machine.transition('awaiting_model');
      expect(machine.beginIteration()).toBe(true);
      expect(machine.iterations).toBe(2);
      expect(machine.beginIteration()).toBe(false);
    });

    it('should pick the next state from the finish reason', () => {
      expect(machine.next('tool_calls', true)).toBe('executing_tools');
      expect(machine.next('tool_calls', false)).toBe('done');
      expect(machine.next('stop', false)).toBe('done');
    });
  });
});

describe('ToolCallParser', () => {
  const parser = new ToolCallParser();

  it('should parse string arguments', () => {
    const calls = parser.parse(response([{ id: 'a', name: 'search_document', arguments: '{"query":"ai"}' }]), 1);

    expect(calls).toEqual([
      { id: 'a', name: 'search_document', arguments: { query: 'ai' }, status: 'pending', iteration: 1 },
    ]);
  });

  it('should fall back to empty arguments for invalid JSON', () => {
    expect(parser.parseArguments('{not json')).toEqual({});
    expect(parser.parseArguments('[1, 2]')).toEqual({});
    expect(parser.parseArguments('')).toEqual({});
    expect(parser.parseArguments({ position: 3 })).toEqual({ position: 3 });
  });

  it('should fill in missing and duplicate ids', () => {
    const calls = parser.parse(response([
      { id: '', name: 'read_document', arguments: {} },
      { id: 'x', name: 'read_document', arguments: {} },
      { id: 'x', name: 'read_document', arguments: {} },
    ]), 3);

    expect(calls.map(c => c.id)).toEqual(['call_3_0', 'x', 'x_2']);
  });
});

describe('Run ids', () => {
  it('should generate distinct parseable ids', () => {
    const runId = generateRunId();
    const sessionId = generateSessionId();

    expect(isValidRunId(runId)).toBe(true);
    expect(isValidRunId(sessionId)).toBe(false);
    expect(parseId(sessionId)?.kind).toBe('session');
    expect(parseId(runId)?.random).toHaveLength(8);
    expect(generateRunId()).not.toBe(runId);
    expect(parseId('run_abc')).toBeNull();
  });
});

describe('buildAgentSystemPrompt', () => {
  it('should join the sections with blank lines', () => {
    const prompt = buildAgentSystemPrompt({
      basePrompt: 'Base',
      toolsPrompt: '## Available tools',
      documentContent: 'abcdef',
      documentPreviewLength: 4,
      selectedText: 'cd',
      ragContext: '[Source 1] (relevance: 0.90)\nfact',
    });

    expect(prompt).toBe([
      'Base',
      '## Available tools',
      '## Current document (6 characters, truncated)\nabcd',
      '## Selected text\ncd',
      '## Knowledge base\n[Source 1] (relevance: 0.90)\nfact',
    ].join('\n\n'));
  });

  it('should leave out absent sections', () => {
    expect(buildAgentSystemPrompt({ basePrompt: 'Base', toolsPrompt: 'Tools', documentPreviewLength: 10 }))
      .toBe('Base\n\nTools');
  });
});
