import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AgentExecutor, AgentRunOutcome } from '../agents/executor';
import { RunStateStore } from './persistence/types';
import { handleConversationalQuery } from './smallTalk';
import { ApprovalDecision, ChatMessage, PendingApproval } from '../types/common';
import { logger } from '../utils/logger';

export const APPROVAL_PROMPT = "I don't have an answer for this. Should I create a support ticket? (yes/no)";

const ChatMessageSchema = z.object({
  type: z.enum(['human', 'ai']),
  content: z.string()
});

const PendingTurnSchema = z.object({
  runState: z.string(),
  history: z.array(ChatMessageSchema),
  pendingApprovals: z.array(z.object({
    toolCallId: z.string(),
    toolName: z.string(),
    arguments: z.string()
  }))
});

export type PendingTurn = z.infer<typeof PendingTurnSchema>;

export interface TurnInput {
  sessionId?: string;
  userInput: string;
  history: ChatMessage[];
}

export interface TurnResult {
  sessionId: string;
  response: string;
  history: ChatMessage[];
  pendingApprovals: PendingApproval[];
}

export class PendingApprovalNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`No pending approval found for session ${sessionId}`);
    this.name = 'PendingApprovalNotFoundError';
  }
}

const APPROVE_ANSWERS = new Set(['yes', 'y']);
const REJECT_ANSWERS = new Set(['no', 'n']);

/**
 * Reads a yes/no reply. Anything else is null.
 */
export function parseConfirmation(input: string): boolean | null {
  const answer = input.trim().toLowerCase();
  if (APPROVE_ANSWERS.has(answer)) {
    return true;
  }
  if (REJECT_ANSWERS.has(answer)) {
    return false;
  }
  return null;
}

/**
 * ConversationService - one customer turn at a time
 *
 * Small talk is answered directly. Everything else runs the support agent;
 * when the agent wants a tool that needs the customer's consent the run is
 * parked in the RunStateStore and the customer is asked to confirm. The
 * next yes/no reply (or an explicit approvals call) resumes it.
 */
export class ConversationService {
  constructor(
    private executor: AgentExecutor,
    private pendingTurns: RunStateStore
  ) {}

  async processTurn(input: TurnInput): Promise<TurnResult> {
    const sessionId = input.sessionId || uuidv4();
    const { userInput, history } = input;

    logger.info('Processing conversation turn', {
      sessionId,
      operation: 'conversation_turn'
    }, { messageLength: userInput.length, historyLength: history.length });

    const pending = await this.loadPendingTurn(sessionId);
    if (pending) {
      const approved = parseConfirmation(userInput);
      if (approved !== null) {
        const decisions = pending.pendingApprovals.map(approval => ({
          toolCallId: approval.toolCallId,
          approved
        }));
        return this.resumeTurn(sessionId, pending, decisions, history, userInput);
      }

      // Any other reply abandons the suspended run
      logger.info('Pending approval abandoned by new question', {
        sessionId,
        operation: 'approval_abandoned'
      });
      await this.pendingTurns.deleteState(sessionId);
    }

    const smallTalk = handleConversationalQuery(userInput);
    if (smallTalk !== null) {
      logger.debug('Answered as small talk', {
        sessionId,
        operation: 'small_talk'
      });
      return this.completeTurn(sessionId, history, userInput, smallTalk);
    }

    try {
      const outcome = await this.executor.run(history, userInput, sessionId);
      return await this.finishRun(sessionId, history, userInput, outcome);
    } catch (error) {
      logger.error('Conversation turn failed', error as Error, {
        sessionId,
        operation: 'conversation_turn'
      });
      throw error;
    }
  }

  /**
   * Apply explicit decisions to the session's pending turn and continue the run.
   * Calls without a decision are rejected.
   */
  async handleToolApprovals(sessionId: string, decisions: ApprovalDecision[]): Promise<TurnResult> {
    logger.info('Processing tool approvals', {
      sessionId,
      operation: 'tool_approvals'
    }, { approvalCount: decisions.length });

    const pending = await this.loadPendingTurn(sessionId);
    if (!pending) {
      throw new PendingApprovalNotFoundError(sessionId);
    }

    return this.resumeTurn(sessionId, pending, decisions, pending.history, null);
  }

  async getPendingApprovals(sessionId: string): Promise<PendingApproval[]> {
    const pending = await this.loadPendingTurn(sessionId);
    return pending ? pending.pendingApprovals : [];
  }

  private async resumeTurn(
    sessionId: string,
    pending: PendingTurn,
    decisions: ApprovalDecision[],
    history: ChatMessage[],
    userInput: string | null
  ): Promise<TurnResult> {
    // Only the caller that removes the pending turn may resume it
    const claimed = await this.pendingTurns.deleteState(sessionId);
    if (!claimed) {
      throw new PendingApprovalNotFoundError(sessionId);
    }

    try {
      const outcome = await this.executor.resume(pending.runState, decisions, sessionId);
      return await this.finishRun(sessionId, history, userInput, outcome);
    } catch (error) {
      logger.error('Resuming pending turn failed', error as Error, {
        sessionId,
        operation: 'tool_approvals'
      });
      throw error;
    }
  }

  private async finishRun(
    sessionId: string,
    history: ChatMessage[],
    userInput: string | null,
    outcome: AgentRunOutcome
  ): Promise<TurnResult> {
    if (outcome.pendingApprovals.length > 0 && outcome.state) {
      const turnHistory = appendTurn(history, userInput, APPROVAL_PROMPT);
      const pendingTurn: PendingTurn = {
        runState: outcome.state,
        history: turnHistory,
        pendingApprovals: outcome.pendingApprovals
      };
      await this.pendingTurns.saveState(sessionId, JSON.stringify(pendingTurn));

      logger.event('approval_requested', {
        sessionId,
        operation: 'interruption_handling'
      }, { tools: outcome.pendingApprovals.map(approval => approval.toolName) });

      return {
        sessionId,
        response: APPROVAL_PROMPT,
        history: turnHistory,
        pendingApprovals: outcome.pendingApprovals
      };
    }

    return this.completeTurn(sessionId, history, userInput, outcome.output);
  }

  private completeTurn(
    sessionId: string,
    history: ChatMessage[],
    userInput: string | null,
    response: string
  ): TurnResult {
    logger.info('Conversation turn completed', {
      sessionId,
      operation: 'conversation_turn_completion'
    }, { responseLength: response.length });

    return {
      sessionId,
      response,
      history: appendTurn(history, userInput, response),
      pendingApprovals: []
    };
  }

  private async loadPendingTurn(sessionId: string): Promise<PendingTurn | null> {
    const stored = await this.pendingTurns.loadState(sessionId);
    if (!stored) {
      return null;
    }

    try {
      const parsed = PendingTurnSchema.safeParse(JSON.parse(stored));
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      logger.debug('Pending turn is not valid JSON', {
        sessionId,
        operation: 'state_load'
      }, { error: (error as Error).message });
    }

    logger.warn('Discarding unreadable pending turn', {
      sessionId,
      operation: 'state_corruption_recovery'
    });
    await this.pendingTurns.deleteState(sessionId);
    return null;
  }
}

function appendTurn(history: ChatMessage[], userInput: string | null, response: string): ChatMessage[] {
  const next = [...history];
  if (userInput !== null) {
    next.push({ type: 'human', content: userInput });
  }
  next.push({ type: 'ai', content: response });
  return next;
}
