import path from 'node:path';
import { jest } from '@jest/globals';
import { baseConversation, clone } from './__mocks__/conversations.fixture';

jest.mock('fs/promises', () => jest.requireActual('./__mocks__/fs.promises.mock'));

import * as fsMock from './__mocks__/fs.promises.mock';
import {
  InMemoryConversationRepository,
  JsonFileConversationRepository
} from '../services/conversationRepository';

const dataDir = path.resolve('virtual', 'conversations');
const fileFor = (id: string) => path.join(dataDir, `${id}.json`);

describe('JsonFileConversationRepository', () => {
  beforeEach(() => {
    fsMock.__reset();
  });

  test('create writes one file per conversation and creates the directory', async () => {
    const repo = new JsonFileConversationRepository(dataDir);
    await repo.create(baseConversation('conv-1'));

    expect(fsMock.__dirs()).toEqual([dataDir]);
    const persisted = JSON.parse(fsMock.__getFile(fileFor('conv-1')) ?? 'null');
    expect(persisted).toEqual(baseConversation('conv-1'));
    // Written through a temp file that is renamed into place
    expect(fsMock.writeCalls.map(c => c.path)).toEqual([`${fileFor('conv-1')}.tmp`]);
    expect(fsMock.__getFile(`${fileFor('conv-1')}.tmp`)).toBeUndefined();
  });

  test('findById returns undefined for a missing file', async () => {
    const repo = new JsonFileConversationRepository(dataDir);
    await expect(repo.findById('nobody')).resolves.toBeUndefined();
  });

  test('findById rejects ids that could escape the data directory', async () => {
    const repo = new JsonFileConversationRepository(dataDir);
    await expect(repo.findById('../secrets')).resolves.toBeUndefined();
  });

  test('save then findById round-trips a record with vehicles', async () => {
    const repo = new JsonFileConversationRepository(dataDir);
    const conversation = baseConversation('conv-2');
    conversation.record = {
      ...conversation.record,
      currentState: 'add_another_vehicle',
      vehicles: [{ make: 'Honda', usage: { use: 'commuting', daysPerWeek: 5, oneWayMiles: 12 } }],
      openVehicleIndex: 0
    };
    await repo.save(conversation);

    await expect(repo.findById('conv-2')).resolves.toEqual(conversation);
  });

  test('create refuses an existing id', async () => {
    const repo = new JsonFileConversationRepository(dataDir);
    await repo.create(baseConversation('conv-3'));
    await expect(repo.create(baseConversation('conv-3'))).rejects.toThrow('Conversation conv-3 already exists');
  });

  test('a file with an unknown state is refused', async () => {
    const broken = clone(baseConversation('conv-4'));
    fsMock.__setFile(fileFor('conv-4'), JSON.stringify({ ...broken, record: { ...broken.record, currentState: 'lunch' } }));
    const repo = new JsonFileConversationRepository(dataDir);
    await expect(repo.findById('conv-4')).rejects.toThrow();
  });
});

describe('InMemoryConversationRepository', () => {
  test('returns copies so callers cannot change stored data', async () => {
    const repo = new InMemoryConversationRepository();
    await repo.create(baseConversation('conv-1'));

    const loaded = await repo.findById('conv-1');
    loaded?.messages.push({ role: 'user', content: 'sneaky', seq: 1, createdAt: '2025-01-01T00:00:00.000Z' });

    const again = await repo.findById('conv-1');
    expect(again?.messages).toHaveLength(1);
  });
});
