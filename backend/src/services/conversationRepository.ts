import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CONVERSATION_STATES, type Conversation } from '../models/structures';

export interface ConversationRepository {
  create(conversation: Conversation): Promise<void>;
  findById(id: string): Promise<Conversation | undefined>;
  save(conversation: Conversation): Promise<void>;
}

// Copies on the way in and out so callers never share mutable state with the store
function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryConversationRepository implements ConversationRepository {
  private readonly items = new Map<string, Conversation>();

  async create(conversation: Conversation): Promise<void> {
    if (this.items.has(conversation.id)) {
      throw new Error(`Conversation ${conversation.id} already exists`);
    }
    this.items.set(conversation.id, clone(conversation));
  }

  async findById(id: string): Promise<Conversation | undefined> {
    const found = this.items.get(id);
    return found ? clone(found) : undefined;
  }

  async save(conversation: Conversation): Promise<void> {
    this.items.set(conversation.id, clone(conversation));
  }
}

// Shape check for files read back from disk
const usageSchema = z.discriminatedUnion('use', [
  z.object({
    use: z.literal('commuting'),
    daysPerWeek: z.number().int().min(1).max(7).optional(),
    oneWayMiles: z.number().int().positive().optional()
  }),
  z.object({
    use: z.enum(['commercial', 'farming', 'business']),
    annualMileage: z.number().int().positive().optional()
  })
]);

const vehicleSchema = z.object({
  vin: z.string().optional(),
  year: z.number().int().optional(),
  make: z.string().optional(),
  model: z.string().optional(),
  bodyType: z.string().optional(),
  entryMode: z.enum(['vin', 'manual', 'decoded']).optional(),
  usage: usageSchema.optional(),
  blindSpotWarning: z.boolean().optional()
});

const conversationSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  record: z.object({
    zipCode: z.string().optional(),
    fullName: z.string().optional(),
    email: z.string().optional(),
    licenseType: z.enum(['foreign', 'personal', 'commercial']).optional(),
    licenseStatus: z.enum(['valid', 'suspended']).optional(),
    currentState: z.enum(CONVERSATION_STATES),
    vehicles: z.array(vehicleSchema),
    openVehicleIndex: z.number().int().nonnegative().nullable()
  }),
  messages: z.array(
    z.object({
      role: z.enum(['user', 'assistant']),
      content: z.string(),
      seq: z.number().int().nonnegative(),
      createdAt: z.string()
    })
  )
});

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per conversation under `dataDir`.
 * Writes go to a temp file first and are renamed into place.
 */
export class JsonFileConversationRepository implements ConversationRepository {
  constructor(private readonly dataDir: string) {}

  private filePath(id: string): string {
    if (!SAFE_ID.test(id)) {
      throw new Error(`Invalid conversation id: ${id}`);
    }
    return path.join(this.dataDir, `${id}.json`);
  }

  private async write(conversation: Conversation): Promise<void> {
    const target = this.filePath(conversation.id);
    const temp = `${target}.tmp`;
    await mkdir(this.dataDir, { recursive: true });
    await writeFile(temp, JSON.stringify(conversation, null, 2), 'utf-8');
    await rename(temp, target);
  }

  async create(conversation: Conversation): Promise<void> {
    if (await this.findById(conversation.id)) {
      throw new Error(`Conversation ${conversation.id} already exists`);
    }
    await this.write(conversation);
  }

  async findById(id: string): Promise<Conversation | undefined> {
    if (!SAFE_ID.test(id)) return undefined;

    let raw: string;
    try {
      raw = await readFile(this.filePath(id), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    return conversationSchema.parse(JSON.parse(raw));
  }

  async save(conversation: Conversation): Promise<void> {
    await this.write(conversation);
  }
}
