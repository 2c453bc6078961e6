import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AgentExecutor, AgentRunOutcome } from '../../src/agents/executor';
import {
  APPROVAL_PROMPT,
  ConversationService,
  PendingApprovalNotFoundError,
  parseConfirmation
} from '../../src/services/conversationService';
import { FileStateStore } from '../../src/services/persistence/fileStore';
import { ApprovalDecision, ChatMessage, PendingApproval } from '../../src/types/common';

const ticketApproval: PendingApproval = {
  toolCallId: 'call_1',
  toolName: 'create_support_ticket_tool',
  arguments: '{"user_question":"Custom ERP integration","user_name":null}'
};

const interrupted: AgentRunOutcome = {
  output: '',
  pendingApprovals: [ticketApproval],
  state: 'serialized-run-state'
};

class FakeExecutor implements AgentExecutor {
  run = jest.fn(async (_history: ChatMessage[], _userInput: string, _sessionId?: string): Promise<AgentRunOutcome> => ({
    output: 'Alice leads the platform team.',
    pendingApprovals: [],
    state: null
  }));

  resume = jest.fn(async (_state: string, decisions: ApprovalDecision[], _sessionId?: string): Promise<AgentRunOutcome> => ({
    output: decisions.every(decision => decision.approved)
      ? 'Ticket TKT-0A1B2C3D created.'
      : 'Okay, no ticket was created.',
    pendingApprovals: [],
    state: null
  }));
}

describe('parseConfirmation', () => {
  it('reads yes and no answers', () => {
    expect(parseConfirmation(' Yes ')).toBe(true);
    expect(parseConfirmation('y')).toBe(true);
    expect(parseConfirmation('NO')).toBe(false);
    expect(parseConfirmation('n')).toBe(false);
    expect(parseConfirmation('yes please')).toBeNull();
  });
});

describe('ConversationService', () => {
  let testDataDir: string;
  let pendingTurns: FileStateStore;
  let executor: FakeExecutor;
  let service: ConversationService;

  beforeEach(async () => {
    testDataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'conversation-'));
    pendingTurns = new FileStateStore({ dataDir: testDataDir });
    await pendingTurns.init();
    executor = new FakeExecutor();
    service = new ConversationService(executor, pendingTurns);
  });

  afterEach(async () => {
    await fs.rm(testDataDir, { recursive: true, force: true });
  });

  it('answers small talk without running the agent', async () => {
    const result = await service.processTurn({ sessionId: 's1', userInput: 'Hello!', history: [] });

    expect(executor.run).not.toHaveBeenCalled();
    expect(result.history).toEqual([
      { type: 'human', content: 'Hello!' },
      { type: 'ai', content: result.response }
    ]);
    expect(result.pendingApprovals).toEqual([]);
  });

  it('generates a session id when none is given', async () => {
    const result = await service.processTurn({ userInput: 'Who is Alice?', history: [] });
    expect(result.sessionId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('runs the agent and appends the turn to history', async () => {
    const history: ChatMessage[] = [{ type: 'human', content: 'Hi' }, { type: 'ai', content: 'Hello!' }];
    const result = await service.processTurn({ sessionId: 's1', userInput: 'Who is Alice?', history });

    expect(executor.run).toHaveBeenCalledWith(history, 'Who is Alice?', 's1');
    expect(result.response).toBe('Alice leads the platform team.');
    expect(result.history).toEqual([
      ...history,
      { type: 'human', content: 'Who is Alice?' },
      { type: 'ai', content: 'Alice leads the platform team.' }
    ]);
  });

  it('asks for confirmation and parks the run when a tool needs approval', async () => {
    executor.run.mockResolvedValueOnce(interrupted);

    const result = await service.processTurn({ sessionId: 's1', userInput: 'Do you integrate with my ERP?', history: [] });

    expect(result.response).toBe(APPROVAL_PROMPT);
    expect(result.pendingApprovals).toEqual([ticketApproval]);
    expect(await service.getPendingApprovals('s1')).toEqual([ticketApproval]);
  });

  it('resumes with approval on yes', async () => {
    executor.run.mockResolvedValueOnce(interrupted);
    const first = await service.processTurn({ sessionId: 's1', userInput: 'Do you integrate with my ERP?', history: [] });

    const result = await service.processTurn({ sessionId: 's1', userInput: 'yes', history: first.history });

    expect(executor.resume).toHaveBeenCalledWith('serialized-run-state', [{ toolCallId: 'call_1', approved: true }], 's1');
    expect(result.response).toBe('Ticket TKT-0A1B2C3D created.');
    expect(result.history).toEqual([
      { type: 'human', content: 'Do you integrate with my ERP?' },
      { type: 'ai', content: APPROVAL_PROMPT },
      { type: 'human', content: 'yes' },
      { type: 'ai', content: 'Ticket TKT-0A1B2C3D created.' }
    ]);
    expect(await service.getPendingApprovals('s1')).toEqual([]);
  });

  it('resumes with a rejection on no', async () => {
    executor.run.mockResolvedValueOnce(interrupted);
    await service.processTurn({ sessionId: 's1', userInput: 'Do you integrate with my ERP?', history: [] });

    const result = await service.processTurn({ sessionId: 's1', userInput: 'no', history: [] });

    expect(executor.resume).toHaveBeenCalledWith('serialized-run-state', [{ toolCallId: 'call_1', approved: false }], 's1');
    expect(result.response).toBe('Okay, no ticket was created.');
  });

  it('abandons the pending turn when the customer asks something else', async () => {
    executor.run.mockResolvedValueOnce(interrupted);
    await service.processTurn({ sessionId: 's1', userInput: 'Do you integrate with my ERP?', history: [] });

    const result = await service.processTurn({ sessionId: 's1', userInput: 'Who is Alice?', history: [] });

    expect(executor.resume).not.toHaveBeenCalled();
    expect(executor.run).toHaveBeenLastCalledWith([], 'Who is Alice?', 's1');
    expect(result.response).toBe('Alice leads the platform team.');
    expect(await service.getPendingApprovals('s1')).toEqual([]);
  });

  it('applies explicit decisions against the stored history', async () => {
    executor.run.mockResolvedValueOnce(interrupted);
    await service.processTurn({ sessionId: 's1', userInput: 'Do you integrate with my ERP?', history: [] });

    const result = await service.handleToolApprovals('s1', [{ toolCallId: 'call_1', approved: true }]);

    expect(result.history).toEqual([
      { type: 'human', content: 'Do you integrate with my ERP?' },
      { type: 'ai', content: APPROVAL_PROMPT },
      { type: 'ai', content: 'Ticket TKT-0A1B2C3D created.' }
    ]);
  });

  it('resumes a pending turn only once when two replies arrive together', async () => {
    executor.run.mockResolvedValueOnce(interrupted);
    await service.processTurn({ sessionId: 's1', userInput: 'Do you integrate with my ERP?', history: [] });

    const results = await Promise.allSettled([
      service.processTurn({ sessionId: 's1', userInput: 'yes', history: [] }),
      service.processTurn({ sessionId: 's1', userInput: 'yes', history: [] })
    ]);

    expect(executor.resume).toHaveBeenCalledTimes(1);
    expect(results.filter(result => result.status === 'fulfilled' && result.value.response === 'Ticket TKT-0A1B2C3D created.'))
      .toHaveLength(1);
  });

  it('refuses explicit decisions for a turn that was already resumed', async () => {
    executor.run.mockResolvedValueOnce(interrupted);
    await service.processTurn({ sessionId: 's1', userInput: 'Do you integrate with my ERP?', history: [] });

    const [first, second] = await Promise.allSettled([
      service.handleToolApprovals('s1', [{ toolCallId: 'call_1', approved: true }]),
      service.handleToolApprovals('s1', [{ toolCallId: 'call_1', approved: true }])
    ]);

    expect(executor.resume).toHaveBeenCalledTimes(1);
    expect([first.status, second.status].sort()).toEqual(['fulfilled', 'rejected']);
  });

  it('reports a missing pending turn', async () => {
    await expect(service.handleToolApprovals('s1', [])).rejects.toBeInstanceOf(PendingApprovalNotFoundError);
  });

  it('discards a pending turn that cannot be read', async () => {
    await pendingTurns.saveState('s1', '{"runState": 42}');

    expect(await service.getPendingApprovals('s1')).toEqual([]);
    expect(await pendingTurns.loadState('s1')).toBeNull();
  });
});
