import { PostgresSupportStore, SqlClient } from '../../src/database/postgresStore';

describe('PostgresSupportStore', () => {
  let query: jest.Mock;
  let end: jest.Mock;
  let store: PostgresSupportStore;

  beforeEach(() => {
    query = jest.fn().mockResolvedValue({ rows: [], rowCount: 0 });
    end = jest.fn().mockResolvedValue(undefined);
    const client: SqlClient = { query, end };
    store = new PostgresSupportStore({ database: 'support_test' }, client);
  });

  it('creates tables and the issue index on init', async () => {
    await store.init();

    const statements: string[] = query.mock.calls.map(call => call[0]);
    expect(statements).toHaveLength(4);
    expect(statements[0]).toContain('CREATE TABLE IF NOT EXISTS teams');
    expect(statements[1]).toContain('CREATE TABLE IF NOT EXISTS faq');
    expect(statements[2]).toContain('CREATE TABLE IF NOT EXISTS tickets');
    expect(statements[3]).toBe('CREATE INDEX IF NOT EXISTS idx_tickets_issue ON tickets (issue)');
  });

  it('reports ping failures as false', async () => {
    query.mockRejectedValueOnce(new Error('connection refused'));
    expect(await store.ping()).toBe(false);
  });

  it('checks for the faq table', async () => {
    query.mockResolvedValueOnce({ rows: [{ present: false }], rowCount: 1 });
    expect(await store.hasFaqTable()).toBe(false);
  });

  it('looks team members up case-insensitively', async () => {
    query.mockResolvedValueOnce({ rows: [{ name: 'Alice Moreau', bio: 'Head of support' }], rowCount: 1 });

    const member = await store.findTeamMemberPartial('alice');

    expect(member).toEqual({ name: 'Alice Moreau', bio: 'Head of support' });
    expect(query).toHaveBeenCalledWith('SELECT name, bio FROM teams WHERE LOWER(name) LIKE $1 LIMIT 1', ['%alice%']);
  });

  it('builds one parameter per keyword for faq candidates', async () => {
    query.mockResolvedValueOnce({
      rows: [{ question: 'Refund policy', answer: '14 days', relevance: 1 }],
      rowCount: 1
    });

    const result = await store.findFaqCandidates(['refund', 'policy'], 'Refund policy?', 3);

    expect(result).toEqual([{ question: 'Refund policy', answer: '14 days' }]);
    const [sql, params] = query.mock.calls[0];
    expect(params).toEqual(['%refund%', '%policy%', '%refund policy?%', 3]);
    expect(sql).toContain(
      'WHERE LOWER(question) LIKE $1 OR LOWER(answer) LIKE $1 OR LOWER(question) LIKE $2 OR LOWER(answer) LIKE $2'
    );
    expect(sql).toContain('WHEN LOWER(question) LIKE $3 THEN 1');
    expect(sql).toContain('LIMIT $4');
  });

  it('skips the faq query without keywords', async () => {
    expect(await store.findFaqCandidates([], 'anything', 3)).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });

  it('maps ticket rows', async () => {
    const createdAt = new Date('2024-05-01T08:00:00.000Z');
    query.mockResolvedValueOnce({
      rows: [{
        ticket_id: 'TKT-ABCDEF12',
        user_name: 'sam',
        issue: 'Export fails',
        response: null,
        status: 'in_progress',
        created_at: createdAt
      }],
      rowCount: 1
    });

    expect(await store.getTicket('TKT-ABCDEF12')).toEqual({
      ticketId: 'TKT-ABCDEF12',
      userName: 'sam',
      issue: 'Export fails',
      response: null,
      status: 'in_progress',
      createdAt
    });
  });

  it('reports whether a ticket response was stored', async () => {
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    expect(await store.updateTicketResponse('TKT-1', 'Done', 'closed')).toBe(true);

    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    expect(await store.updateTicketResponse('TKT-2', 'Done', 'closed')).toBe(false);
  });

  it('filters and limits the ticket list', async () => {
    await store.listTickets({ status: 'open', limit: 5 });

    expect(query).toHaveBeenCalledWith(
      'SELECT ticket_id, user_name, issue, response, status, created_at FROM tickets WHERE status = $1 ORDER BY created_at DESC LIMIT $2',
      ['open', 5]
    );
  });

  it('closes the client', async () => {
    await store.close();
    expect(end).toHaveBeenCalledTimes(1);
  });
});
