import type { ContextSnapshot, ConversationState, Message } from '../models/structures';

export type ReplyRequest = {
  state: ConversationState;
  userText: string;
  history: Message[];          // most recent entries, oldest first
  context: ContextSnapshot;
  guidance?: string;           // set when the last answer was rejected
};

export interface ReplyGenerator {
  generate(request: ReplyRequest): Promise<string>;
}

export type ChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

// Minimal text-completion seam; the OpenAI adapter lives in openaiClient.ts
export interface CompletionClient {
  complete(messages: ChatMessage[]): Promise<string>;
}

export class ReplyGenerationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ReplyGenerationError';
  }
}

export const HISTORY_LIMIT = 10;

const BASE_PROMPT = `You are a friendly, professional insurance onboarding assistant. Your role is to collect information from users in a conversational way. Be concise but warm.

CRITICAL RULES:
1. You MUST ONLY ask the question specified in your current task - nothing else
2. NEVER skip ahead to other questions or topics
3. Always acknowledge what the user just provided, then IMMEDIATELY ask the EXACT question specified in your current task
4. If the user seems frustrated, upset, or asks to speak with a human, respond with empathy
5. Validate inputs naturally (e.g., if email looks invalid, politely ask them to check it)
6. Keep responses brief - one or two sentences when asking for information
7. Don't repeat information the user has already provided
8. NEVER say things like "That's all the information I need" or "We're all set" or "Do you have any other vehicles" unless the current task explicitly says to ask that`;

const STATE_INSTRUCTIONS: Record<ConversationState, string> = {
  zip_code: "Ask for their ZIP code. Validate it's a 5-digit number.",
  full_name: 'Briefly acknowledge their ZIP code, then ask for their full name.',
  email: 'Briefly acknowledge their name, then ask for their email address.',
  vehicle_choice: 'Briefly acknowledge their email, then ask if they want to provide a VIN number OR enter Year, Make, and Body Type manually.',
  vehicle_vin: "Ask for their vehicle's VIN (17 characters).",
  vehicle_year: "Ask for the vehicle's year.",
  vehicle_make: "Acknowledge the year, then ask for the vehicle's make (e.g., Toyota, Ford, Honda).",
  vehicle_body: "Acknowledge the make, then ask for the vehicle's body type (e.g., Sedan, SUV, Truck, Coupe).",
  vehicle_use: 'Acknowledge the vehicle details, then ask how they use this vehicle. Options: Commuting, Commercial, Farming, or Business.',
  blind_spot_warning: 'Acknowledge the vehicle use, then ask if the vehicle has blind spot warning equipment (Yes/No).',
  commute_days: 'Acknowledge their response, then ask how many days per week they use this vehicle for commuting.',
  commute_miles: 'Acknowledge the days, then ask about one-way miles to work/school.',
  annual_mileage: 'Acknowledge their response, then ask for their estimated ANNUAL MILEAGE for this vehicle. Do NOT ask about other vehicles or license yet - ONLY ask for annual mileage.',
  add_another_vehicle: 'Acknowledge the information collected, then ask if they want to add another vehicle to their policy.',
  license_type: 'Acknowledge the vehicle information is complete, then ask about their US license type. Options: Foreign, Personal, or Commercial.',
  license_status: 'Acknowledge the license type, then ask about their license status: Valid or Suspended.',
  complete: 'Thank them warmly and let them know their information has been collected successfully. Keep it brief and positive.'
};

// Sent instead of a generated reply when generation fails
export const FALLBACK_REPLIES: Record<ConversationState, string> = {
  zip_code: 'Could you please provide your ZIP code?',
  full_name: 'What is your full name?',
  email: 'What is your email address?',
  vehicle_choice: 'Would you like to enter a VIN or provide Year, Make, and Body Type?',
  vehicle_vin: 'Please enter the 17-character VIN.',
  vehicle_year: 'What year is the vehicle?',
  vehicle_make: 'What is the make of the vehicle?',
  vehicle_body: 'What is the body type?',
  vehicle_use: 'How do you use this vehicle? (Commuting, Commercial, Farming, Business)',
  blind_spot_warning: 'Does this vehicle have blind spot warning? (Yes/No)',
  commute_days: 'How many days per week do you commute?',
  commute_miles: 'How many miles is your one-way commute?',
  annual_mileage: 'Thank you! Now, what is your estimated annual mileage for this vehicle?',
  add_another_vehicle: 'Would you like to add another vehicle?',
  license_type: 'What type of US license do you have? (Foreign, Personal, Commercial)',
  license_status: 'What is your license status? (Valid/Suspended)',
  complete: 'Thank you! Your information has been collected successfully. You can now start a new session if needed.'
};

export function buildSystemPrompt(state: ConversationState, context: ContextSnapshot, guidance?: string): string {
  const lines = Object.entries(context)
    .filter(([, value]) => value !== undefined && value !== '')
    .map(([key, value]) => `- ${key}: ${String(value)}`);
  const contextBlock = lines.length ? `\n\nCollected information so far:\n${lines.join('\n')}\n` : '';

  let prompt = `${BASE_PROMPT}\n\n=== YOUR CURRENT TASK (DO EXACTLY THIS) ===\n${STATE_INSTRUCTIONS[state]}\n===========================================${contextBlock}`;
  if (guidance) {
    prompt += `\n\nAdditional context: ${guidance}`;
  }
  return prompt;
}

/**
 * System prompt, then the recent log. The current user text is appended
 * unless the log already ends with it.
 */
export function buildChatMessages(request: ReplyRequest): ChatMessage[] {
  const messages: ChatMessage[] = [
    { role: 'system', content: buildSystemPrompt(request.state, request.context, request.guidance) }
  ];
  for (const entry of request.history.slice(-HISTORY_LIMIT)) {
    messages.push({ role: entry.role, content: entry.content });
  }
  const last = messages[messages.length - 1];
  if (last.role !== 'user' || last.content !== request.userText) {
    messages.push({ role: 'user', content: request.userText });
  }
  return messages;
}

export class LlmReplyGenerator implements ReplyGenerator {
  constructor(private readonly client: CompletionClient) {}

  async generate(request: ReplyRequest): Promise<string> {
    let text: string;
    try {
      text = await this.client.complete(buildChatMessages(request));
    } catch (error) {
      throw new ReplyGenerationError('Completion request failed', error);
    }
    const trimmed = text.trim();
    if (!trimmed) {
      throw new ReplyGenerationError('Completion returned no text');
    }
    return trimmed;
  }
}
