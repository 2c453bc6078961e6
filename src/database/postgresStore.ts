import { Pool, QueryResult, QueryResultRow } from 'pg';
import { logger } from '../utils/logger';
import { FaqEntry, SupportStore, TeamMember, Ticket, TicketFilter, TicketStatus, isTicketStatus } from './types';

export interface PostgresStoreConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
  ssl?: boolean;
}

/**
 * The slice of a pg Pool the store relies on
 */
export interface SqlClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  end(): Promise<void>;
}

type TeamRow = { name: string; bio: string };
type FaqRow = { question: string; answer: string };
type RankedFaqRow = FaqRow & { relevance: number };

interface TicketRow extends QueryResultRow {
  ticket_id: string;
  user_name: string;
  issue: string;
  response: string | null;
  status: string;
  created_at: Date;
}

const CREATE_TABLES = [
  `CREATE TABLE IF NOT EXISTS teams (
    id SERIAL PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    bio TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS faq (
    id SERIAL PRIMARY KEY,
    question TEXT NOT NULL,
    answer TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS tickets (
    id SERIAL PRIMARY KEY,
    ticket_id VARCHAR(20) UNIQUE NOT NULL,
    user_name VARCHAR(255) NOT NULL,
    issue TEXT NOT NULL,
    response TEXT,
    status VARCHAR(50) NOT NULL DEFAULT 'open',
    created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  'CREATE INDEX IF NOT EXISTS idx_tickets_issue ON tickets (issue)'
];

const TICKET_COLUMNS = 'ticket_id, user_name, issue, response, status, created_at';

/**
 * PostgreSQL-based implementation of SupportStore using node-postgres
 */
export class PostgresSupportStore implements SupportStore {
  private config: PostgresStoreConfig;
  private client: SqlClient;

  constructor(config: PostgresStoreConfig = {}, client?: SqlClient) {
    this.config = {
      host: config.host || 'localhost',
      port: config.port || 5432,
      database: config.database || 'ai_agent',
      username: config.username || 'postgres',
      password: config.password,
      ssl: config.ssl || false,
      connectionString: config.connectionString
    };
    this.client = client ?? createPoolClient(this.config);
  }

  async init(): Promise<void> {
    try {
      for (const statement of CREATE_TABLES) {
        await this.client.query(statement);
      }
      logger.info('PostgreSQL support store initialized', {
        operation: 'database_init'
      }, {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database
      });
    } catch (error) {
      logger.error('Failed to initialize PostgreSQL support store', error as Error, {
        operation: 'database_init'
      });
      throw error;
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('Database ping failed', {
        operation: 'database_ping'
      }, { error: (error as Error).message });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  async hasFaqTable(): Promise<boolean> {
    const result = await this.client.query<{ present: boolean }>(
      "SELECT to_regclass('public.faq') IS NOT NULL AS present"
    );
    return result.rows[0]?.present === true;
  }

  async findTeamMemberExact(nameLower: string): Promise<TeamMember | null> {
    const result = await this.client.query<TeamRow>(
      'SELECT name, bio FROM teams WHERE LOWER(name) = $1 LIMIT 1',
      [nameLower]
    );
    return result.rows[0] ?? null;
  }

  async findTeamMemberPartial(nameLower: string): Promise<TeamMember | null> {
    const result = await this.client.query<TeamRow>(
      'SELECT name, bio FROM teams WHERE LOWER(name) LIKE $1 LIMIT 1',
      [`%${nameLower}%`]
    );
    return result.rows[0] ?? null;
  }

  async findFaqCandidates(keywords: string[], question: string, limit: number): Promise<FaqEntry[]> {
    if (keywords.length === 0) {
      return [];
    }

    const params: unknown[] = [];
    const conditions: string[] = [];
    for (const keyword of keywords) {
      params.push(`%${keyword}%`);
      const placeholder = `$${params.length}`;
      conditions.push(`LOWER(question) LIKE ${placeholder}`, `LOWER(answer) LIKE ${placeholder}`);
    }

    params.push(`%${question.toLowerCase()}%`);
    const phrasePlaceholder = `$${params.length}`;
    params.push(limit);
    const limitPlaceholder = `$${params.length}`;

    const sql = `
      SELECT question, answer,
        (CASE
          WHEN LOWER(question) LIKE ${phrasePlaceholder} THEN 1
          WHEN LOWER(answer) LIKE ${phrasePlaceholder} THEN 2
          ELSE 3
        END) AS relevance
      FROM faq
      WHERE ${conditions.join(' OR ')}
      ORDER BY relevance, LENGTH(question)
      LIMIT ${limitPlaceholder}
    `;

    const result = await this.client.query<RankedFaqRow>(sql, params);
    return result.rows.map(row => ({ question: row.question, answer: row.answer }));
  }

  async findFaqByPhrase(question: string): Promise<FaqEntry | null> {
    const phrase = `%${question.toLowerCase()}%`;
    const result = await this.client.query<FaqRow>(
      'SELECT question, answer FROM faq WHERE LOWER(question) LIKE $1 OR LOWER(answer) LIKE $1 ORDER BY LENGTH(question) LIMIT 1',
      [phrase]
    );
    return result.rows[0] ?? null;
  }

  async insertTicket(ticket: Ticket): Promise<void> {
    await this.client.query(
      `INSERT INTO tickets (ticket_id, user_name, issue, response, status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [ticket.ticketId, ticket.userName, ticket.issue, ticket.response, ticket.status, ticket.createdAt]
    );
  }

  async getTicket(ticketId: string): Promise<Ticket | null> {
    const result = await this.client.query<TicketRow>(
      `SELECT ${TICKET_COLUMNS} FROM tickets WHERE ticket_id = $1`,
      [ticketId]
    );
    const row = result.rows[0];
    return row ? toTicket(row) : null;
  }

  async updateTicketResponse(ticketId: string, response: string, status: TicketStatus): Promise<boolean> {
    const result = await this.client.query(
      'UPDATE tickets SET response = $1, status = $2 WHERE ticket_id = $3',
      [response, status, ticketId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findAnsweredTicket(issue: string): Promise<string | null> {
    const result = await this.client.query<{ response: string }>(
      'SELECT response FROM tickets WHERE issue = $1 AND response IS NOT NULL ORDER BY created_at DESC LIMIT 1',
      [issue]
    );
    return result.rows[0]?.response ?? null;
  }

  async listTickets(filter: TicketFilter = {}): Promise<Ticket[]> {
    const params: unknown[] = [];
    let sql = `SELECT ${TICKET_COLUMNS} FROM tickets`;
    if (filter.status) {
      params.push(filter.status);
      sql += ` WHERE status = $${params.length}`;
    }
    sql += ' ORDER BY created_at DESC';
    if (filter.limit !== undefined) {
      params.push(filter.limit);
      sql += ` LIMIT $${params.length}`;
    }
    const result = await this.client.query<TicketRow>(sql, params);
    return result.rows.map(toTicket);
  }

  async addTeamMembers(members: TeamMember[]): Promise<void> {
    for (const member of members) {
      await this.client.query('INSERT INTO teams (name, bio) VALUES ($1, $2)', [member.name, member.bio]);
    }
  }

  async addFaqEntries(entries: FaqEntry[]): Promise<void> {
    for (const entry of entries) {
      await this.client.query('INSERT INTO faq (question, answer) VALUES ($1, $2)', [entry.question, entry.answer]);
    }
  }
}

function toTicket(row: TicketRow): Ticket {
  return {
    ticketId: row.ticket_id,
    userName: row.user_name,
    issue: row.issue,
    response: row.response,
    status: isTicketStatus(row.status) ? row.status : 'open',
    createdAt: new Date(row.created_at)
  };
}

function createPoolClient(config: PostgresStoreConfig): SqlClient {
  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.username,
    password: config.password,
    ssl: config.ssl
  });

  pool.on('error', error => {
    logger.error('Idle PostgreSQL client error', error, {
      operation: 'database_pool'
    });
  });

  return {
    query: <R extends QueryResultRow>(text: string, values?: unknown[]) => pool.query<R>(text, values),
    end: () => pool.end()
  };
}
