/**
 * Records held by the support database.
 */

export interface TeamMember {
  name: string;
  bio: string;
}

export interface FaqEntry {
  question: string;
  answer: string;
}

export type TicketStatus = 'open' | 'in_progress' | 'closed';

export const TICKET_STATUSES: readonly TicketStatus[] = ['open', 'in_progress', 'closed'];

export interface Ticket {
  ticketId: string;
  userName: string;
  issue: string;
  response: string | null;
  status: TicketStatus;
  createdAt: Date;
}

export interface TicketFilter {
  status?: TicketStatus;
  limit?: number;
}

/**
 * SupportStore interface for the pluggable support database
 *
 * Implementations back the team directory, the FAQ table and the ticket
 * queue. Lookups that find nothing resolve to null rather than throwing;
 * connection and query failures reject.
 */
export interface SupportStore {
  /**
   * Create tables, directories or connections as needed
   */
  init(): Promise<void>;

  /**
   * Resolves true when the backend is reachable
   */
  ping(): Promise<boolean>;

  close(): Promise<void>;

  hasFaqTable(): Promise<boolean>;

  /**
   * @param nameLower - lower-cased name compared case-insensitively
   */
  findTeamMemberExact(nameLower: string): Promise<TeamMember | null>;

  findTeamMemberPartial(nameLower: string): Promise<TeamMember | null>;

  /**
   * FAQ entries matching any keyword, best first.
   *
   * Relevance is 1 when the question contains the whole lower-cased user
   * question, 2 when the answer does and 3 otherwise; ties are broken by
   * the length of the FAQ question.
   */
  findFaqCandidates(keywords: string[], question: string, limit: number): Promise<FaqEntry[]>;

  /**
   * Shortest-question FAQ entry containing the whole user question
   */
  findFaqByPhrase(question: string): Promise<FaqEntry | null>;

  insertTicket(ticket: Ticket): Promise<void>;

  getTicket(ticketId: string): Promise<Ticket | null>;

  /**
   * @returns false when no ticket has that id
   */
  updateTicketResponse(ticketId: string, response: string, status: TicketStatus): Promise<boolean>;

  /**
   * Response of the most recent ticket with exactly this issue that has been answered
   */
  findAnsweredTicket(issue: string): Promise<string | null>;

  /**
   * Newest first
   */
  listTickets(filter?: TicketFilter): Promise<Ticket[]>;

  addTeamMembers(members: TeamMember[]): Promise<void>;

  addFaqEntries(entries: FaqEntry[]): Promise<void>;
}

export function isTicketStatus(value: string): value is TicketStatus {
  return (TICKET_STATUSES as readonly string[]).includes(value);
}
