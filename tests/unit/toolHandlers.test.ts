import { DatabaseQueryService } from '../../src/services/databaseQuery';
import { TicketService } from '../../src/services/ticketService';
import { Ticket } from '../../src/database/types';
import {
  NO_DATABASE_MATCH,
  NO_DOCUMENTATION_MATCH,
  TICKET_CREATION_FAILED,
  SupportToolHandlers,
  createSupportToolHandlers
} from '../../src/tools/handlers';
import { TOOL_NAMES, createSupportTools } from '../../src/tools/support-tools';

const ticket: Ticket = {
  ticketId: 'TKT-0A1B2C3D',
  userName: 'sam',
  issue: 'Custom ERP integration',
  response: null,
  status: 'open',
  createdAt: new Date('2024-04-01T00:00:00.000Z')
};

describe('Support tool handlers', () => {
  let tickets: jest.Mocked<Pick<TicketService, 'findAnsweredTicket' | 'createTicket' | 'getTicket'>>;
  let database: jest.Mocked<Pick<DatabaseQueryService, 'query'>>;
  let knowledgeBase: { search: jest.Mock };
  let handlers: SupportToolHandlers;

  beforeEach(() => {
    tickets = {
      findAnsweredTicket: jest.fn().mockResolvedValue(null),
      createTicket: jest.fn().mockResolvedValue(ticket),
      getTicket: jest.fn().mockResolvedValue(ticket)
    };
    database = { query: jest.fn().mockResolvedValue({ found: false, response: 'No information found.' }) };
    knowledgeBase = { search: jest.fn().mockResolvedValue(null) };
    handlers = createSupportToolHandlers({
      tickets,
      database,
      knowledgeBase
    });
  });

  describe('queryDatabase', () => {
    it('prefers the answer of a resolved ticket', async () => {
      tickets.findAnsweredTicket.mockResolvedValueOnce('Yes, via webhooks.');
      expect(await handlers.queryDatabase({ question: 'ERP?' })).toBe('Yes, via webhooks.');
      expect(database.query).not.toHaveBeenCalled();
    });

    it('returns the database answer', async () => {
      database.query.mockResolvedValueOnce({ found: true, response: 'Alice: Head of support' });
      expect(await handlers.queryDatabase({ question: 'who is alice' })).toBe('Alice: Head of support');
    });

    it('reports when nothing matched', async () => {
      expect(await handlers.queryDatabase({ question: 'zzz' })).toBe(NO_DATABASE_MATCH);
    });

    it('turns failures into an error message', async () => {
      database.query.mockRejectedValueOnce(new Error('connection lost'));
      expect(await handlers.queryDatabase({ question: 'zzz' })).toBe('Database query error: connection lost');
    });
  });

  describe('queryKnowledgeBase', () => {
    it('returns the documentation answer', async () => {
      knowledgeBase.search.mockResolvedValueOnce('14 days.');
      expect(await handlers.queryKnowledgeBase({ question: 'refunds?' })).toBe('14 days.');
    });

    it('reports when the documentation has no answer', async () => {
      expect(await handlers.queryKnowledgeBase({ question: 'mars?' })).toBe(NO_DOCUMENTATION_MATCH);
    });

    it('turns failures into an error message', async () => {
      knowledgeBase.search.mockRejectedValueOnce(new Error('index missing'));
      expect(await handlers.queryKnowledgeBase({ question: 'refunds?' })).toBe('RAG search error: index missing');
    });
  });

  describe('createSupportTicket', () => {
    it('confirms the ticket id', async () => {
      const result = await handlers.createSupportTicket({ user_question: 'Custom ERP integration', user_name: null });

      expect(result).toBe('Support ticket #TKT-0A1B2C3D created successfully. Our team will respond soon.');
      expect(tickets.createTicket).toHaveBeenCalledWith(null, 'Custom ERP integration');
    });

    it('reports failures', async () => {
      tickets.createTicket.mockRejectedValueOnce(new Error('disk full'));
      expect(await handlers.createSupportTicket({ user_question: 'x', user_name: 'sam' })).toBe(TICKET_CREATION_FAILED);
    });
  });

  describe('checkTicketStatus', () => {
    it('describes a pending ticket', async () => {
      expect(await handlers.checkTicketStatus({ ticket_id: 'tkt-0a1b2c3d' })).toBe(
        'Ticket TKT-0A1B2C3D (open)\nIssue: Custom ERP integration\nResponse: Pending from support.'
      );
    });

    it('includes the support response', async () => {
      tickets.getTicket.mockResolvedValueOnce({ ...ticket, status: 'closed', response: 'Use the REST API.' });
      expect(await handlers.checkTicketStatus({ ticket_id: 'TKT-0A1B2C3D' })).toBe(
        'Ticket TKT-0A1B2C3D (closed)\nIssue: Custom ERP integration\nResponse: Use the REST API.'
      );
    });

    it('reports unknown tickets', async () => {
      tickets.getTicket.mockResolvedValueOnce(null);
      expect(await handlers.checkTicketStatus({ ticket_id: 'TKT-FFFFFFFF' })).toBe('Ticket TKT-FFFFFFFF not found.');
    });
  });

  describe('tool definitions', () => {
    it('exposes the four tools and gates ticket creation behind approval', () => {
      const tools = createSupportTools(handlers);

      expect(tools.map(t => t.name)).toEqual([
        TOOL_NAMES.queryDatabase,
        TOOL_NAMES.queryKnowledgeBase,
        TOOL_NAMES.createSupportTicket,
        TOOL_NAMES.checkTicketStatus
      ]);
      expect(tools.map(t => t.needsApproval)).toEqual([false, false, true, false]);
    });

  });
});
