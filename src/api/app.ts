import express, { Response } from 'express';
import cors from 'cors';
import { z, ZodError } from 'zod';
import { SupportStore, Ticket } from '../database/types';
import { IndexingSummary, KnowledgeBaseStats } from '../rag/knowledgeBase';
import { ConversationService, PendingApprovalNotFoundError, TurnResult } from '../services/conversationService';
import { TicketService } from '../services/ticketService';
import { logger } from '../utils/logger';

export const API_VERSION = '1.0.0';

const TicketStatusSchema = z.enum(['open', 'in_progress', 'closed']);

const ChatRequestSchema = z.object({
  user_input: z.string().trim().min(1),
  conversation_history: z.array(z.object({
    type: z.enum(['human', 'ai']),
    content: z.string()
  })).default([]),
  session_id: z.string().min(1).optional()
});

const ApprovalRequestSchema = z.object({
  session_id: z.string().min(1),
  decisions: z.array(z.object({
    tool_call_id: z.string().min(1),
    approved: z.boolean()
  }))
});

const TicketListQuerySchema = z.object({
  status: TicketStatusSchema.optional(),
  limit: z.coerce.number().int().positive().optional()
});

const TicketResponseSchema = z.object({
  response: z.string().trim().min(1),
  status: TicketStatusSchema.optional()
});

export interface KnowledgeBaseAdmin {
  initialize(): Promise<IndexingSummary>;
  getStats(): Promise<KnowledgeBaseStats>;
}

export interface AppDependencies {
  conversation: ConversationService;
  tickets: TicketService;
  knowledgeBase: KnowledgeBaseAdmin;
  store: Pick<SupportStore, 'ping'>;
}

export function serializeTicket(ticket: Ticket) {
  return {
    ticket_id: ticket.ticketId,
    user_name: ticket.userName,
    issue: ticket.issue,
    response: ticket.response,
    status: ticket.status,
    created_at: ticket.createdAt.toISOString()
  };
}

function serializeTurn(result: TurnResult) {
  return {
    agent_response: result.response,
    updated_conversation_history: result.history,
    session_id: result.sessionId,
    pending_approvals: result.pendingApprovals.map(approval => ({
      tool_call_id: approval.toolCallId,
      tool_name: approval.toolName,
      arguments: approval.arguments
    }))
  };
}

function sendValidationError(res: Response, error: ZodError) {
  return res.status(400).json({
    error: 'Invalid request',
    details: error.errors.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
  });
}

function sendServerError(res: Response, error: unknown, operation: string) {
  logger.error('Request failed', error as Error, { operation });
  return res.status(500).json({
    error: 'Internal server error',
    message: error instanceof Error ? error.message : String(error)
  });
}

/**
 * HTTP surface: customer chat, approvals, the ticket admin queue and
 * knowledge-base maintenance
 */
export function createApp(deps: AppDependencies) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  /**
   * Chat Endpoint
   *
   * Expected payload:
   * {
   *   "user_input": "who is alice?",
   *   "conversation_history": [{ "type": "human", "content": "hi" }],
   *   "session_id": "optional-session-id"
   * }
   */
  app.post('/chat', async (req, res) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const result = await deps.conversation.processTurn({
        sessionId: parsed.data.session_id,
        userInput: parsed.data.user_input,
        history: parsed.data.conversation_history
      });
      return res.json(serializeTurn(result));
    } catch (error) {
      // a concurrent reply already resumed the pending turn
      if (error instanceof PendingApprovalNotFoundError) {
        return res.status(409).json({ error: 'Approval already handled', message: error.message });
      }
      return sendServerError(res, error, 'chat');
    }
  });

  /**
   * Approval Endpoint
   * Decides the tool calls a session is waiting on; calls left out are rejected.
   */
  app.post('/approvals', async (req, res) => {
    const parsed = ApprovalRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const result = await deps.conversation.handleToolApprovals(
        parsed.data.session_id,
        parsed.data.decisions.map(decision => ({
          toolCallId: decision.tool_call_id,
          approved: decision.approved
        }))
      );
      return res.json(serializeTurn(result));
    } catch (error) {
      if (error instanceof PendingApprovalNotFoundError) {
        return res.status(404).json({ error: 'No pending approval', message: error.message });
      }
      return sendServerError(res, error, 'approvals');
    }
  });

  app.get('/tickets', async (req, res) => {
    const parsed = TicketListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const tickets = await deps.tickets.listTickets(parsed.data);
      return res.json({ tickets: tickets.map(serializeTicket) });
    } catch (error) {
      return sendServerError(res, error, 'ticket_list');
    }
  });

  app.get('/tickets/:ticketId', async (req, res) => {
    try {
      const ticket = await deps.tickets.getTicket(req.params.ticketId);
      if (!ticket) {
        return res.status(404).json({ error: 'Ticket not found', ticket_id: req.params.ticketId });
      }
      return res.json(serializeTicket(ticket));
    } catch (error) {
      return sendServerError(res, error, 'ticket_get');
    }
  });

  /**
   * Support staff answer a ticket; the ticket is closed unless another status is given
   */
  app.post('/tickets/:ticketId/response', async (req, res) => {
    const parsed = TicketResponseSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const ticket = await deps.tickets.respondToTicket(
        req.params.ticketId,
        parsed.data.response,
        parsed.data.status
      );
      if (!ticket) {
        return res.status(404).json({ error: 'Ticket not found', ticket_id: req.params.ticketId });
      }
      return res.json(serializeTicket(ticket));
    } catch (error) {
      return sendServerError(res, error, 'ticket_respond');
    }
  });

  app.post('/knowledge-base/refresh', async (req, res) => {
    try {
      const summary = await deps.knowledgeBase.initialize();
      return res.json(summary);
    } catch (error) {
      return sendServerError(res, error, 'kb_refresh');
    }
  });

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: API_VERSION
    });
  });

  /**
   * Status Endpoint - database connectivity and knowledge-base size
   */
  app.get('/status', async (req, res) => {
    try {
      const [databaseUp, knowledgeBase] = await Promise.all([
        deps.store.ping(),
        deps.knowledgeBase.getStats()
      ]);
      return res.json({
        status: 'running',
        database: databaseUp ? 'connected' : 'disconnected',
        knowledge_base: knowledgeBase,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      return sendServerError(res, error, 'status');
    }
  });

  return app;
}
