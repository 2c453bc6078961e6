import { tool } from '@openai/agents';
import { z } from 'zod';
import { withToolLogging } from '../utils/toolProxy';
import { SupportToolHandlers } from './handlers';

export const TOOL_NAMES = {
  queryDatabase: 'query_database_tool',
  queryKnowledgeBase: 'query_rag_tool',
  createSupportTicket: 'create_support_ticket_tool',
  checkTicketStatus: 'check_ticket_status_tool'
} as const;

export function createSupportTools(handlers: SupportToolHandlers) {
  const queryDatabaseTool = tool({
    name: TOOL_NAMES.queryDatabase,
    description: 'Look up team members, FAQs and answers to previously resolved support tickets in the support database',
    parameters: z.object({
      question: z.string().describe("The customer's question")
    }),
    execute: withToolLogging(TOOL_NAMES.queryDatabase, handlers.queryDatabase)
  });

  const queryRagTool = tool({
    name: TOOL_NAMES.queryKnowledgeBase,
    description: 'Search the company documentation (policies, procedures, product guides) for an answer',
    parameters: z.object({
      question: z.string().describe("The customer's question")
    }),
    execute: withToolLogging(TOOL_NAMES.queryKnowledgeBase, handlers.queryKnowledgeBase)
  });

  const createSupportTicketTool = tool({
    name: TOOL_NAMES.createSupportTicket,
    description: 'Escalate a question to the human support team by opening a ticket. Requires customer confirmation.',
    parameters: z.object({
      user_question: z.string().describe('The question or issue to escalate, in the customer\'s words'),
      user_name: z.string().nullable().describe('Customer name if known, otherwise null')
    }),
    needsApproval: true,
    execute: withToolLogging(TOOL_NAMES.createSupportTicket, handlers.createSupportTicket)
  });

  const checkTicketStatusTool = tool({
    name: TOOL_NAMES.checkTicketStatus,
    description: 'Check the status and the support team\'s response for a ticket id such as TKT-1A2B3C4D',
    parameters: z.object({
      ticket_id: z.string().describe('The ticket id')
    }),
    execute: withToolLogging(TOOL_NAMES.checkTicketStatus, handlers.checkTicketStatus)
  });

  return [queryDatabaseTool, queryRagTool, createSupportTicketTool, checkTicketStatusTool];
}
