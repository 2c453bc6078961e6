import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileSupportStore } from '../../src/database/fileStore';
import { Ticket } from '../../src/database/types';

function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    ticketId: 'TKT-00000001',
    userName: 'sam',
    issue: 'How do I export invoices?',
    response: null,
    status: 'open',
    createdAt: new Date('2024-03-01T10:00:00.000Z'),
    ...overrides
  };
}

describe('FileSupportStore', () => {
  let testDataDir: string;
  let filePath: string;
  let store: FileSupportStore;

  beforeEach(async () => {
    testDataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'support-store-'));
    filePath = path.join(testDataDir, 'support-db.json');
    store = new FileSupportStore({ filePath });
    await store.init();
  });

  afterEach(async () => {
    await fs.rm(testDataDir, { recursive: true, force: true });
  });

  it('creates an empty database file on init', async () => {
    const content = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(content).toEqual({ teams: [], faq: [], tickets: [] });
    expect(await store.ping()).toBe(true);
  });

  it('finds team members by exact and partial name', async () => {
    await store.addTeamMembers([
      { name: 'Alice Moreau', bio: 'Head of support' },
      { name: 'Alicia Keyes', bio: 'Billing' }
    ]);

    expect(await store.findTeamMemberExact('alicia keyes')).toEqual({ name: 'Alicia Keyes', bio: 'Billing' });
    expect(await store.findTeamMemberExact('alice')).toBeNull();
    expect(await store.findTeamMemberPartial('alice')).toEqual({ name: 'Alice Moreau', bio: 'Head of support' });
  });

  it('reports a missing faq table when faq is null', async () => {
    expect(await store.hasFaqTable()).toBe(true);

    await fs.writeFile(filePath, JSON.stringify({ teams: [], faq: null, tickets: [] }));
    expect(await store.hasFaqTable()).toBe(false);
  });

  it('ranks faq candidates', async () => {
    await store.addFaqEntries([
      { question: 'What are your business hours?', answer: 'Nine to six.' },
      { question: 'Where are you?', answer: 'Lyon.' }
    ]);

    const candidates = await store.findFaqCandidates(['business', 'hours'], 'What are your business hours?', 3);
    expect(candidates).toEqual([{ question: 'What are your business hours?', answer: 'Nine to six.' }]);
  });

  it('stores and reads tickets', async () => {
    const ticket = makeTicket();
    await store.insertTicket(ticket);

    expect(await store.getTicket('TKT-00000001')).toEqual(ticket);
    expect(await store.getTicket('TKT-FFFFFFFF')).toBeNull();
  });

  it('rejects duplicate ticket ids', async () => {
    await store.insertTicket(makeTicket());
    await expect(store.insertTicket(makeTicket())).rejects.toThrow('Ticket TKT-00000001 already exists');
  });

  it('updates a ticket response and reports unknown ids', async () => {
    await store.insertTicket(makeTicket());

    expect(await store.updateTicketResponse('TKT-00000001', 'Use the Billing page.', 'closed')).toBe(true);
    expect(await store.updateTicketResponse('TKT-FFFFFFFF', 'nothing', 'closed')).toBe(false);

    const updated = await store.getTicket('TKT-00000001');
    expect(updated?.response).toBe('Use the Billing page.');
    expect(updated?.status).toBe('closed');
  });

  it('returns the newest answered ticket for an identical issue', async () => {
    await store.insertTicket(makeTicket({
      ticketId: 'TKT-00000001',
      response: 'Old answer',
      createdAt: new Date('2024-01-01T00:00:00.000Z')
    }));
    await store.insertTicket(makeTicket({
      ticketId: 'TKT-00000002',
      response: 'New answer',
      createdAt: new Date('2024-02-01T00:00:00.000Z')
    }));
    await store.insertTicket(makeTicket({
      ticketId: 'TKT-00000003',
      response: null,
      createdAt: new Date('2024-03-01T00:00:00.000Z')
    }));

    expect(await store.findAnsweredTicket('How do I export invoices?')).toBe('New answer');
    expect(await store.findAnsweredTicket('how do i export invoices?')).toBeNull();
  });

  it('lists tickets newest first with status filter and limit', async () => {
    await store.insertTicket(makeTicket({ ticketId: 'TKT-A', createdAt: new Date('2024-01-01T00:00:00.000Z') }));
    await store.insertTicket(makeTicket({ ticketId: 'TKT-B', status: 'closed', createdAt: new Date('2024-01-02T00:00:00.000Z') }));
    await store.insertTicket(makeTicket({ ticketId: 'TKT-C', createdAt: new Date('2024-01-03T00:00:00.000Z') }));

    expect((await store.listTickets()).map(t => t.ticketId)).toEqual(['TKT-C', 'TKT-B', 'TKT-A']);
    expect((await store.listTickets({ status: 'open' })).map(t => t.ticketId)).toEqual(['TKT-C', 'TKT-A']);
    expect((await store.listTickets({ limit: 1 })).map(t => t.ticketId)).toEqual(['TKT-C']);
  });

  it('serializes concurrent ticket inserts', async () => {
    await Promise.all([
      store.insertTicket(makeTicket({ ticketId: 'TKT-1' })),
      store.insertTicket(makeTicket({ ticketId: 'TKT-2' })),
      store.insertTicket(makeTicket({ ticketId: 'TKT-3' }))
    ]);

    const ids = (await store.listTickets()).map(t => t.ticketId).sort();
    expect(ids).toEqual(['TKT-1', 'TKT-2', 'TKT-3']);
  });
});
