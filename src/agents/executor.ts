import { Agent, AgentInputItem, RunState, RunToolApprovalItem, assistant, run, user } from '@openai/agents';
import { ApprovalDecision, ChatMessage, PendingApproval } from '../types/common';
import { logger } from '../utils/logger';

export interface AgentRunOutcome {
  output: string;
  pendingApprovals: PendingApproval[];
  /** Serialized run state, present only while approvals are pending */
  state: string | null;
}

export interface AgentExecutor {
  run(history: ChatMessage[], userInput: string, sessionId?: string): Promise<AgentRunOutcome>;
  resume(serializedState: string, decisions: ApprovalDecision[], sessionId?: string): Promise<AgentRunOutcome>;
}

export interface AgentExecutorOptions {
  maxTurns: number;
  historyLimit: number;
}

export function toAgentInput(history: ChatMessage[], userInput: string, historyLimit: number): AgentInputItem[] {
  const recent = historyLimit > 0 ? history.slice(-historyLimit) : [];
  return [
    ...recent.map(message => message.type === 'human' ? user(message.content) : assistant(message.content)),
    user(userInput)
  ];
}

export function toPendingApproval(item: RunToolApprovalItem): PendingApproval | null {
  const raw = item.rawItem;
  if (raw.type !== 'function_call') {
    return null;
  }
  return { toolCallId: raw.callId, toolName: raw.name, arguments: raw.arguments };
}

/**
 * Runs the support agent with the OpenAI Agents SDK. A run that stops on a
 * tool needing approval hands back its serialized state so the turn can be
 * resumed once the customer decides.
 */
export class OpenAIAgentExecutor implements AgentExecutor {
  constructor(
    private agent: Agent,
    private options: AgentExecutorOptions
  ) {}

  async run(history: ChatMessage[], userInput: string, sessionId?: string): Promise<AgentRunOutcome> {
    const input = toAgentInput(history, userInput, this.options.historyLimit);
    logger.debug('Running agent', {
      sessionId,
      agentName: this.agent.name,
      operation: 'agent_run'
    }, { inputItems: input.length });

    const result = await run(this.agent, input, { maxTurns: this.options.maxTurns });
    return this.toOutcome(result.finalOutput, result.interruptions, result.state, sessionId);
  }

  async resume(serializedState: string, decisions: ApprovalDecision[], sessionId?: string): Promise<AgentRunOutcome> {
    const state = await RunState.fromString(this.agent, serializedState);

    for (const interruption of state.getInterruptions()) {
      const pending = toPendingApproval(interruption);
      const decision = decisions.find(d => pending !== null && d.toolCallId === pending.toolCallId);
      // no decision counts as a rejection
      if (decision?.approved) {
        state.approve(interruption);
      } else {
        state.reject(interruption);
      }
      logger.info(decision?.approved ? 'Tool call approved' : 'Tool call rejected', {
        sessionId,
        toolName: pending?.toolName,
        operation: 'tool_approval'
      });
    }

    const result = await run(this.agent, state, { maxTurns: this.options.maxTurns });
    return this.toOutcome(result.finalOutput, result.interruptions, result.state, sessionId);
  }

  private toOutcome<TContext>(
    finalOutput: string | undefined,
    interruptions: RunToolApprovalItem[],
    state: RunState<TContext, Agent>,
    sessionId?: string
  ): AgentRunOutcome {
    const pendingApprovals = interruptions
      .map(toPendingApproval)
      .filter((approval): approval is PendingApproval => approval !== null);

    if (pendingApprovals.length > 0) {
      logger.event('run_interrupted', {
        sessionId,
        agentName: this.agent.name
      }, { tools: pendingApprovals.map(approval => approval.toolName) });
      return { output: '', pendingApprovals, state: state.toString() };
    }

    return { output: finalOutput ?? '', pendingApprovals: [], state: null };
  }
}
