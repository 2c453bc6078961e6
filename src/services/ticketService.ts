import { v4 as uuidv4 } from 'uuid';
import { SupportStore, Ticket, TicketFilter, TicketStatus } from '../database/types';
import { logger } from '../utils/logger';

export const DEFAULT_USER_NAME = 'anonymous';

/**
 * Ticket ids look like TKT-1A2B3C4D
 */
export function generateTicketId(): string {
  return `TKT-${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

export function normalizeTicketId(ticketId: string): string {
  return ticketId.trim().toUpperCase();
}

/**
 * TicketService - the human escalation queue
 *
 * Customers open tickets through the agent; support staff answer them
 * through the admin API. Answered tickets are reused as answers for
 * later customers asking the identical question.
 */
export class TicketService {
  constructor(
    private store: SupportStore,
    private idGenerator: () => string = generateTicketId
  ) {}

  async createTicket(userName: string | null | undefined, issue: string): Promise<Ticket> {
    const ticket: Ticket = {
      ticketId: this.idGenerator(),
      userName: userName?.trim() || DEFAULT_USER_NAME,
      issue,
      response: null,
      status: 'open',
      createdAt: new Date()
    };

    await this.store.insertTicket(ticket);
    logger.logTicketCreated(ticket.ticketId, { operation: 'ticket_create' });

    return ticket;
  }

  async getTicket(ticketId: string): Promise<Ticket | null> {
    return this.store.getTicket(normalizeTicketId(ticketId));
  }

  /**
   * Record a human response. Returns the updated ticket, or null for an unknown id.
   */
  async respondToTicket(ticketId: string, response: string, status: TicketStatus = 'closed'): Promise<Ticket | null> {
    const id = normalizeTicketId(ticketId);
    const updated = await this.store.updateTicketResponse(id, response, status);
    if (!updated) {
      logger.warn('Response submitted for unknown ticket', {
        ticketId: id,
        operation: 'ticket_respond'
      });
      return null;
    }

    logger.info('Ticket response recorded', {
      ticketId: id,
      operation: 'ticket_respond'
    }, { status });

    return this.store.getTicket(id);
  }

  /**
   * Response of a previously answered ticket with the exact same issue text.
   * Lookup failures are logged and treated as "no answer".
   */
  async findAnsweredTicket(question: string): Promise<string | null> {
    try {
      return await this.store.findAnsweredTicket(question);
    } catch (error) {
      logger.error('Error querying past tickets', error as Error, {
        operation: 'ticket_answer_lookup'
      });
      return null;
    }
  }

  async listTickets(filter: TicketFilter = {}): Promise<Ticket[]> {
    return this.store.listTickets(filter);
  }
}
