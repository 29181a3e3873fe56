/**
 * Agent State Machine
 *
 * awaiting_model -> executing_tools -> awaiting_model -> ... -> done
 */

import type { AgentState } from './types';
import type { FinishReason } from '../model-adapter/types';

// ============================================================================
// State Transitions
// ============================================================================

const VALID_TRANSITIONS: Record<AgentState, AgentState[]> = {
  awaiting_model: ['executing_tools', 'done'],
  executing_tools: ['awaiting_model', 'done'],
  done: [],
};

// ============================================================================
// State Machine
// ============================================================================

export class AgentStateMachine {
  private current: AgentState = 'awaiting_model';
  private iteration = 0;

  constructor(private readonly maxIterations: number) {}

  get state(): AgentState {
    return this.current;
  }

  /**
   * Iterations started so far, 1-based once the first model call begins
   */
  get iterations(): number {
    return this.iteration;
  }

  canTransition(from: AgentState, to: AgentState): boolean {
    return VALID_TRANSITIONS[from].includes(to);
  }

  transition(to: AgentState): AgentState {
    if (!this.canTransition(this.current, to)) {
      throw new Error(`Invalid state transition: ${this.current} -> ${to}`);
    }
    this.current = to;
    return to;
  }

  /**
   * Start the next model call if the budget allows it
   */
  beginIteration(): boolean {
    if (this.current !== 'awaiting_model' || this.iteration >= this.maxIterations) {
      return false;
    }
    this.iteration++;
    return true;
  }

  /**
   * Next state for a model turn's finish reason
   */
  next(finishReason: FinishReason, hasToolCalls: boolean): AgentState {
    return finishReason === 'tool_calls' && hasToolCalls ? 'executing_tools' : 'done';
  }

  isFinal(): boolean {
    return this.current === 'done';
  }
}
