import { InMemoryConversationRepository } from '../services/conversationRepository';
import {
  CLOSING_STATEMENT,
  ConversationEngine,
  frustrationReply,
  WELCOME_MESSAGE,
  type EngineDependencies,
  type TurnOutcome
} from '../services/conversationEngine';
import { KeywordFrustrationDetector } from '../services/frustrationDetector';
import { FALLBACK_REPLIES, type ReplyRequest } from '../services/replyGenerator';
import { fakeLookup, fakeReplyGenerator, fixedQuote } from './__mocks__/collaborators.fixture';
import { TEST_VIN } from './__mocks__/conversations.fixture';

function setup(overrides: Partial<EngineDependencies> = {}, replyImpl?: (r: ReplyRequest) => Promise<string>) {
  const repository = new InMemoryConversationRepository();
  const { lookup, decodeVin } = fakeLookup();
  const { generator, requests } = fakeReplyGenerator(replyImpl);
  let ids = 0;
  const engine = new ConversationEngine({
    repository,
    lookup,
    replyGenerator: generator,
    frustrationDetector: new KeywordFrustrationDetector(),
    quoteProvider: fixedQuote(),
    newId: () => `conv-${++ids}`,
    now: () => new Date('2025-03-01T12:00:00.000Z'),
    ...overrides
  });
  return { engine, repository, requests, decodeVin };
}

async function say(engine: ConversationEngine, id: string, text: string): Promise<TurnOutcome> {
  const res = await engine.processMessage(id, text);
  if (!res.ok) throw new Error(res.error.message);
  return res.data;
}

async function sayAll(engine: ConversationEngine, id: string, texts: string[]): Promise<TurnOutcome[]> {
  const outcomes: TurnOutcome[] = [];
  for (const text of texts) {
    outcomes.push(await say(engine, id, text));
  }
  return outcomes;
}

async function stored(repository: InMemoryConversationRepository, id: string) {
  const conversation = await repository.findById(id);
  if (!conversation) throw new Error(`missing ${id}`);
  return conversation;
}

const APPLICANT = ['my zip is 90210', 'Jane Tester', 'jane@example.com'];

describe('conversationEngine: start', () => {
  test('creates a conversation at zip_code with the welcome message logged', async () => {
    const { engine, repository } = setup();
    const started = await engine.startConversation();

    expect(started).toEqual({ conversationId: 'conv-1', message: WELCOME_MESSAGE, state: 'zip_code', progress: 'location' });
    const conversation = await stored(repository, 'conv-1');
    expect(conversation.messages).toEqual([
      { role: 'assistant', content: WELCOME_MESSAGE, seq: 0, createdAt: '2025-03-01T12:00:00.000Z' }
    ]);
  });

  test('unknown conversation is reported, not thrown', async () => {
    const { engine } = setup();
    const res = await engine.processMessage('nope', 'hi');
    expect(res).toEqual({ ok: false, error: { code: 'CONVERSATION_NOT_FOUND', message: 'Conversation not found' } });
  });
});

describe('conversationEngine: accepted and rejected turns', () => {
  test('accepted answer mutates, transitions and logs both messages', async () => {
    const { engine, repository, requests } = setup();
    const { conversationId } = await engine.startConversation();

    const turn = await say(engine, conversationId, 'my zip is 90210 thanks');

    expect(turn).toMatchObject({ kind: 'accepted', state: 'full_name', reply: 'reply for full_name', isComplete: false });
    expect(turn.context).toEqual({ zipCode: '90210', vehiclesCount: 0 });

    const conversation = await stored(repository, conversationId);
    expect(conversation.messages.map(m => [m.role, m.seq])).toEqual([['assistant', 0], ['user', 1], ['assistant', 2]]);
    expect(conversation.messages[2].content).toBe('reply for full_name');

    // Reply generator saw the updated state and the log including the new message
    expect(requests).toHaveLength(1);
    expect(requests[0].state).toBe('full_name');
    expect(requests[0].guidance).toBeUndefined();
    expect(requests[0].history.map(m => m.content)).toEqual([WELCOME_MESSAGE, 'my zip is 90210 thanks']);
  });

  test('rejected answer keeps state and passes guidance', async () => {
    const { engine, repository, requests } = setup();
    const { conversationId } = await engine.startConversation();

    const turn = await say(engine, conversationId, 'zip 123');

    expect(turn.kind).toBe('rejected');
    expect(turn.state).toBe('zip_code');
    expect(requests[0].guidance).toBe("The user's input was invalid. Error: Please provide a valid 5-digit ZIP code.");
    expect((await stored(repository, conversationId)).record.zipCode).toBeUndefined();
  });

  test('vehicle_choice silent re-ask sends no guidance', async () => {
    const { engine, requests } = setup();
    const { conversationId } = await engine.startConversation();
    await sayAll(engine, conversationId, APPLICANT);

    const turn = await say(engine, conversationId, 'hmm');

    expect(turn.state).toBe('vehicle_choice');
    expect(requests[requests.length - 1].guidance).toBeUndefined();
  });

  test('history passed to the generator is capped at 10 entries', async () => {
    const { engine, requests } = setup();
    const { conversationId } = await engine.startConversation();
    await sayAll(engine, conversationId, ['a', 'b', 'c', 'd', 'e', 'f']);

    const last = requests[requests.length - 1];
    expect(last.history).toHaveLength(10);
    expect(last.history[9]).toMatchObject({ role: 'user', content: 'f' });
  });
});

describe('conversationEngine: vehicle flow', () => {
  test('inline VIN opens a vehicle and jumps to vehicle_use', async () => {
    const { engine, repository } = setup();
    const { conversationId } = await engine.startConversation();
    const outcomes = await sayAll(engine, conversationId, [...APPLICANT, `here it is ${TEST_VIN}`]);

    expect(outcomes.map(o => o.state)).toEqual(['full_name', 'email', 'vehicle_choice', 'vehicle_use']);
    const { record } = await stored(repository, conversationId);
    expect(record.vehicles).toHaveLength(1);
    expect(record.vehicles[0]).toEqual({
      vin: TEST_VIN,
      year: 2003,
      make: 'HONDA',
      model: 'Accord',
      bodyType: 'Coupe',
      entryMode: 'decoded'
    });
  });

  test('commuting and business vehicles fill only their own mileage fields', async () => {
    const { engine, repository } = setup();
    const { conversationId } = await engine.startConversation();

    const outcomes = await sayAll(engine, conversationId, [
      ...APPLICANT,
      TEST_VIN, 'commuting', 'yes', '5', '12',
      'yes',
      'manual', '2019', 'toyota', 'sedan', 'business', 'no', '12,000',
      'no'
    ]);

    expect(outcomes.map(o => o.state)).toEqual([
      'full_name', 'email', 'vehicle_choice',
      'vehicle_use', 'blind_spot_warning', 'commute_days', 'commute_miles', 'add_another_vehicle',
      'vehicle_choice',
      'vehicle_year', 'vehicle_make', 'vehicle_body', 'vehicle_use', 'blind_spot_warning', 'annual_mileage', 'add_another_vehicle',
      'license_type'
    ]);

    const { record } = await stored(repository, conversationId);
    expect(record.vehicles).toHaveLength(2);
    expect(record.openVehicleIndex).toBe(1);
    expect(record.vehicles[0].usage).toEqual({ use: 'commuting', daysPerWeek: 5, oneWayMiles: 12 });
    expect(record.vehicles[0].blindSpotWarning).toBe(true);
    expect(record.vehicles[1]).toEqual({
      entryMode: 'manual',
      year: 2019,
      make: 'Toyota',
      bodyType: 'Sedan',
      usage: { use: 'business', annualMileage: 12000 },
      blindSpotWarning: false
    });
  });

  test('each "yes" to another vehicle adds exactly one vehicle', async () => {
    const { engine } = setup();
    const { conversationId } = await engine.startConversation();
    await sayAll(engine, conversationId, [...APPLICANT, TEST_VIN, 'business', 'no', '8000']);

    const first = await say(engine, conversationId, 'yes');
    expect(first.context.vehiclesCount).toBe(2);

    await sayAll(engine, conversationId, [TEST_VIN, 'farm', 'no', '3000']);
    const second = await say(engine, conversationId, 'add another');
    expect(second.context.vehiclesCount).toBe(3);
    expect(second.state).toBe('vehicle_choice');
  });
});

describe('conversationEngine: license and completion', () => {
  const toLicense = [...APPLICANT, TEST_VIN, 'business', 'no', '8000', 'no'];

  test('foreign license completes without asking status', async () => {
    const { engine, repository } = setup();
    const { conversationId } = await engine.startConversation();
    await sayAll(engine, conversationId, toLicense);

    const turn = await say(engine, conversationId, 'foreign');

    expect(turn.state).toBe('complete');
    expect(turn.isComplete).toBe(true);
    expect(turn.progress).toBe('done');
    const { record } = await stored(repository, conversationId);
    expect(record.licenseType).toBe('foreign');
    expect(record.licenseStatus).toBeUndefined();
  });

  test('personal license asks status then completes', async () => {
    const { engine } = setup();
    const { conversationId } = await engine.startConversation();
    await sayAll(engine, conversationId, toLicense);

    const outcomes = await sayAll(engine, conversationId, ['personal', 'valid']);
    expect(outcomes.map(o => o.state)).toEqual(['license_status', 'complete']);
    expect(outcomes[1].context).toMatchObject({ licenseType: 'personal', licenseStatus: 'valid' });
  });

  test('after completion replies are fixed and the record never changes', async () => {
    const { engine, repository, requests } = setup();
    const { conversationId } = await engine.startConversation();
    await sayAll(engine, conversationId, [...toLicense, 'foreign']);
    const before = (await stored(repository, conversationId)).record;
    const generated = requests.length;

    const turn = await say(engine, conversationId, 'my zip is 10001 and I am frustrated');

    expect(turn).toMatchObject({ kind: 'closed', reply: CLOSING_STATEMENT, state: 'complete' });
    expect(requests).toHaveLength(generated);
    expect((await stored(repository, conversationId)).record).toEqual(before);
  });
});

describe('conversationEngine: frustration and failures', () => {
  test('frustrated message gets a quote and skips validation', async () => {
    const { engine, repository, requests } = setup();
    const { conversationId } = await engine.startConversation();

    const turn = await say(engine, conversationId, '90210 this is ridiculous');

    expect(turn.kind).toBe('frustrated');
    expect(turn.reply).toBe(frustrationReply('Test quote.'));
    expect(turn.state).toBe('zip_code');
    expect(requests).toHaveLength(0);
    expect((await stored(repository, conversationId)).record.zipCode).toBeUndefined();
  });

  test('quote provider failure still produces the empathetic reply', async () => {
    const { engine } = setup({ quoteProvider: { getQuote: async () => { throw new Error('down'); } } });
    const { conversationId } = await engine.startConversation();

    const turn = await say(engine, conversationId, 'I want a real person');
    expect(turn.reply).toContain("I understand this can be frustrating. Here's something to brighten your day:");
  });

  test('generator failure falls back to the sentence for the new state', async () => {
    const { engine, repository } = setup({}, async () => { throw new Error('model offline'); });
    const { conversationId } = await engine.startConversation();

    const turn = await say(engine, conversationId, '90210');

    expect(turn.reply).toBe(FALLBACK_REPLIES.full_name);
    expect(turn.state).toBe('full_name');
    const conversation = await stored(repository, conversationId);
    expect(conversation.messages[conversation.messages.length - 1].content).toBe('What is your full name?');
  });

  test('generator that never answers is cut off by the reply timeout', async () => {
    const { engine } = setup({ replyTimeoutMs: 20 }, () => new Promise<string>(() => undefined));
    const { conversationId } = await engine.startConversation();

    const turn = await say(engine, conversationId, 'zip 1');
    expect(turn.reply).toBe(FALLBACK_REPLIES.zip_code);
  });
});

describe('conversationEngine: concurrency', () => {
  test('turns on one conversation run one after another', async () => {
    const slow = async (r: ReplyRequest) => {
      await new Promise(resolve => setTimeout(resolve, 10));
      return `reply for ${r.state}`;
    };
    const { engine, repository } = setup({}, slow);
    const { conversationId } = await engine.startConversation();

    const [a, b] = await Promise.all([
      say(engine, conversationId, '90210'),
      say(engine, conversationId, 'Jane Tester')
    ]);

    expect(a.state).toBe('full_name');
    expect(b.state).toBe('email');
    const conversation = await stored(repository, conversationId);
    expect(conversation.messages.map(m => m.content)).toEqual([
      WELCOME_MESSAGE, '90210', 'reply for full_name', 'Jane Tester', 'reply for email'
    ]);
  });

  test('separate conversations do not share state', async () => {
    const { engine } = setup();
    const one = await engine.startConversation();
    const two = await engine.startConversation();

    await say(engine, one.conversationId, '90210');
    const turn = await say(engine, two.conversationId, 'Jane Tester');

    expect(one.conversationId).not.toBe(two.conversationId);
    expect(turn.state).toBe('zip_code');
  });
});
