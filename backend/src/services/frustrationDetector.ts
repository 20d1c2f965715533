export interface FrustrationDetector {
  isFrustrated(text: string): boolean;
}

export const FRUSTRATION_KEYWORDS = [
  'frustrated', 'angry', 'annoyed', 'speak to human', 'talk to someone',
  'real person', 'agent', 'representative', 'this is ridiculous',
  'hate this', 'stupid', 'useless', 'waste of time', 'give up',
  'help me', 'not working', "doesn't work", 'broken'
];

// Keyword match over the lowercased message
export class KeywordFrustrationDetector implements FrustrationDetector {
  constructor(private readonly keywords: readonly string[] = FRUSTRATION_KEYWORDS) {}

  isFrustrated(text: string): boolean {
    const lower = text.toLowerCase();
    return this.keywords.some(keyword => lower.includes(keyword));
  }
}
