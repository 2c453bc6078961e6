import { DatabaseQueryService } from '../services/databaseQuery';
import { TicketService } from '../services/ticketService';
import { logger } from '../utils/logger';

export const NO_DATABASE_MATCH = 'No matching information was found in the support database.';
export const NO_DOCUMENTATION_MATCH = 'No relevant information found in documentation.';
export const TICKET_CREATION_FAILED = 'Failed to create a support ticket. Please try again later.';
export const PENDING_RESPONSE = 'Pending from support.';

export interface DocumentationSearch {
  search(query: string): Promise<string | null>;
}

export interface SupportToolDependencies {
  tickets: Pick<TicketService, 'findAnsweredTicket' | 'createTicket' | 'getTicket'>;
  database: Pick<DatabaseQueryService, 'query'>;
  knowledgeBase: DocumentationSearch;
}

export interface SupportToolHandlers {
  queryDatabase(params: { question: string }): Promise<string>;
  queryKnowledgeBase(params: { question: string }): Promise<string>;
  createSupportTicket(params: { user_question: string; user_name: string | null }): Promise<string>;
  checkTicketStatus(params: { ticket_id: string }): Promise<string>;
}

/**
 * Tool bodies. None of them throws: failures come back as text the agent can relay.
 */
export function createSupportToolHandlers(deps: SupportToolDependencies): SupportToolHandlers {
  return {
    async queryDatabase({ question }) {
      try {
        const previousAnswer = await deps.tickets.findAnsweredTicket(question);
        if (previousAnswer) {
          return previousAnswer;
        }

        const result = await deps.database.query(question);
        return result.found ? result.response : NO_DATABASE_MATCH;
      } catch (error) {
        logger.error('Database tool failed', error as Error, {
          toolName: 'query_database_tool',
          operation: 'tool_execution'
        });
        return `Database query error: ${(error as Error).message}`;
      }
    },

    async queryKnowledgeBase({ question }) {
      try {
        const answer = await deps.knowledgeBase.search(question);
        return answer ?? NO_DOCUMENTATION_MATCH;
      } catch (error) {
        logger.error('Documentation tool failed', error as Error, {
          toolName: 'query_rag_tool',
          operation: 'tool_execution'
        });
        return `RAG search error: ${(error as Error).message}`;
      }
    },

    async createSupportTicket({ user_question, user_name }) {
      try {
        const ticket = await deps.tickets.createTicket(user_name, user_question);
        return `Support ticket #${ticket.ticketId} created successfully. Our team will respond soon.`;
      } catch (error) {
        logger.error('Ticket creation failed', error as Error, {
          toolName: 'create_support_ticket_tool',
          operation: 'ticket_create'
        });
        return TICKET_CREATION_FAILED;
      }
    },

    async checkTicketStatus({ ticket_id }) {
      try {
        const ticket = await deps.tickets.getTicket(ticket_id);
        if (!ticket) {
          return `Ticket ${ticket_id} not found.`;
        }
        return `Ticket ${ticket.ticketId} (${ticket.status})\nIssue: ${ticket.issue}\nResponse: ${ticket.response ?? PENDING_RESPONSE}`;
      } catch (error) {
        logger.error('Ticket status lookup failed', error as Error, {
          toolName: 'check_ticket_status_tool',
          operation: 'ticket_status'
        });
        return `Failed to check ticket ${ticket_id}: ${(error as Error).message}`;
      }
    }
  };
}
