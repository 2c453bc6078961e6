import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger';
import { FaqEntry, SupportStore, TeamMember, Ticket, TicketFilter, TicketStatus, isTicketStatus } from './types';
import { findFaqByPhrase, rankFaqCandidates } from './faqRanking';
import { isMissingFile, isRecord } from '../utils/guards';

export interface FileSupportStoreConfig {
  filePath: string;
}

interface StoredTicket {
  ticketId: string;
  userName: string;
  issue: string;
  response: string | null;
  status: TicketStatus;
  createdAt: string;
}

interface SupportDocument {
  teams: TeamMember[];
  faq: FaqEntry[] | null;
  tickets: StoredTicket[];
}

/**
 * File-based implementation of SupportStore
 *
 * Keeps the team directory, FAQ and tickets in a single JSON document.
 * Writes are serialized through a promise chain and land via a temp file
 * rename, so concurrent ticket creation never interleaves partial writes.
 * A `faq` value of null mirrors a database without the faq table.
 */
export class FileSupportStore implements SupportStore {
  private config: FileSupportStoreConfig;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(config: Partial<FileSupportStoreConfig> = {}) {
    this.config = {
      filePath: config.filePath || './data/support-db.json'
    };
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.config.filePath), { recursive: true });
      try {
        await fs.access(this.config.filePath);
      } catch {
        await this.writeDocument({ teams: [], faq: [], tickets: [] });
      }
      logger.info('File support store initialized', {
        operation: 'database_init'
      }, { filePath: this.config.filePath });
    } catch (error) {
      logger.error('Failed to initialize file support store', error as Error, {
        operation: 'database_init'
      });
      throw error;
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.readDocument();
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  async hasFaqTable(): Promise<boolean> {
    const document = await this.readDocument();
    return document.faq !== null;
  }

  async findTeamMemberExact(nameLower: string): Promise<TeamMember | null> {
    const document = await this.readDocument();
    return document.teams.find(member => member.name.toLowerCase() === nameLower) ?? null;
  }

  async findTeamMemberPartial(nameLower: string): Promise<TeamMember | null> {
    const document = await this.readDocument();
    return document.teams.find(member => member.name.toLowerCase().includes(nameLower)) ?? null;
  }

  async findFaqCandidates(keywords: string[], question: string, limit: number): Promise<FaqEntry[]> {
    const document = await this.readDocument();
    return rankFaqCandidates(document.faq ?? [], keywords, question, limit);
  }

  async findFaqByPhrase(question: string): Promise<FaqEntry | null> {
    const document = await this.readDocument();
    return findFaqByPhrase(document.faq ?? [], question);
  }

  async insertTicket(ticket: Ticket): Promise<void> {
    await this.mutate(document => {
      if (document.tickets.some(existing => existing.ticketId === ticket.ticketId)) {
        throw new Error(`Ticket ${ticket.ticketId} already exists`);
      }
      document.tickets.push(toStoredTicket(ticket));
    });
  }

  async getTicket(ticketId: string): Promise<Ticket | null> {
    const document = await this.readDocument();
    const stored = document.tickets.find(ticket => ticket.ticketId === ticketId);
    return stored ? fromStoredTicket(stored) : null;
  }

  async updateTicketResponse(ticketId: string, response: string, status: TicketStatus): Promise<boolean> {
    let updated = false;
    await this.mutate(document => {
      const stored = document.tickets.find(ticket => ticket.ticketId === ticketId);
      if (stored) {
        stored.response = response;
        stored.status = status;
        updated = true;
      }
    });
    return updated;
  }

  async findAnsweredTicket(issue: string): Promise<string | null> {
    const document = await this.readDocument();
    const answered = document.tickets
      .filter(ticket => ticket.issue === issue && ticket.response !== null)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
    return answered[0]?.response ?? null;
  }

  async listTickets(filter: TicketFilter = {}): Promise<Ticket[]> {
    const document = await this.readDocument();
    const tickets = document.tickets
      .filter(ticket => !filter.status || ticket.status === filter.status)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt))
      .map(fromStoredTicket);
    return filter.limit !== undefined ? tickets.slice(0, filter.limit) : tickets;
  }

  async addTeamMembers(members: TeamMember[]): Promise<void> {
    await this.mutate(document => {
      document.teams.push(...members);
    });
  }

  async addFaqEntries(entries: FaqEntry[]): Promise<void> {
    await this.mutate(document => {
      document.faq = [...(document.faq ?? []), ...entries];
    });
  }

  private async mutate(change: (document: SupportDocument) => void): Promise<void> {
    const next = this.writeChain.then(async () => {
      const document = await this.readDocument();
      change(document);
      await this.writeDocument(document);
    });
    // Keep the chain usable after a failed write; the caller still sees the rejection
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async readDocument(): Promise<SupportDocument> {
    let content: string;
    try {
      content = await fs.readFile(this.config.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { teams: [], faq: [], tickets: [] };
      }
      throw error;
    }
    return parseSupportDocument(content);
  }

  private async writeDocument(document: SupportDocument): Promise<void> {
    const tempPath = `${this.config.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(document, null, 2));
    await fs.rename(tempPath, this.config.filePath);
  }
}

function parseSupportDocument(content: string): SupportDocument {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error('Support database file is not a JSON object');
  }
  return {
    teams: Array.isArray(parsed.teams) ? parsed.teams.filter(isTeamMember) : [],
    faq: parsed.faq === null ? null : Array.isArray(parsed.faq) ? parsed.faq.filter(isFaqEntry) : [],
    tickets: Array.isArray(parsed.tickets) ? parsed.tickets.filter(isStoredTicket) : []
  };
}

function toStoredTicket(ticket: Ticket): StoredTicket {
  return { ...ticket, createdAt: ticket.createdAt.toISOString() };
}

function fromStoredTicket(stored: StoredTicket): Ticket {
  return { ...stored, createdAt: new Date(stored.createdAt) };
}

function isTeamMember(value: unknown): value is TeamMember {
  return isRecord(value) && typeof value.name === 'string' && typeof value.bio === 'string';
}

function isFaqEntry(value: unknown): value is FaqEntry {
  return isRecord(value) && typeof value.question === 'string' && typeof value.answer === 'string';
}

function isStoredTicket(value: unknown): value is StoredTicket {
  return isRecord(value) &&
    typeof value.ticketId === 'string' &&
    typeof value.userName === 'string' &&
    typeof value.issue === 'string' &&
    (typeof value.response === 'string' || value.response === null) &&
    typeof value.status === 'string' &&
    isTicketStatus(value.status) &&
    typeof value.createdAt === 'string';
}
