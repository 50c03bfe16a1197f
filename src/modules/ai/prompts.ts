export const SYSTEM_PROMPT = `You are a marketing strategist and creative co-pilot. Your role is to help users create comprehensive, data-driven marketing campaigns.

Key Responsibilities:
1. Understand user requirements through guided questioning
2. Extract and organize marketing context (audience, tone, goals, platforms)
3. Provide strategic marketing insights
4. Generate complete campaign deliverables (ad copy, emails, social posts)
5. Tailor all content to the specific brand context

Always maintain a professional yet approachable tone. Ask one question at a time to avoid overwhelming the user. Provide clear, actionable marketing advice.`;

export const WELCOME_MESSAGE = `👋 Welcome! I'm your AI Marketing Strategist. I'll help you create a comprehensive marketing campaign step by step.

Let's start by understanding your basics. Tell me about your product or service, and I'll guide you through the rest.`;

export function buildConversationPrompt(
  contextText: string,
  state: string,
  userMessage: string,
  nextQuestion: string
): string {
  return `Current Context:
${contextText || '(nothing collected yet)'}

Conversation State: ${state}
User Message: "${userMessage}"

Next question to guide toward: ${nextQuestion}

Your Response Should:
1. Acknowledge the user's input naturally
2. Guide them toward the next question organically
3. Provide marketing insights when relevant
4. Keep the conversation focused and productive
5. Be concise but helpful

Respond as a marketing expert:`;
}

export function buildCampaignPrompt(contextText: string): string {
  return `Generate a COMPLETE marketing campaign based on this context:

${contextText || '(the user asked to proceed with no details; make sensible assumptions)'}

DELIVERABLES REQUIRED:

1. CAMPAIGN STRATEGY OVERVIEW
- Overall approach and positioning
- Key differentiators
- Success metrics

2. AD COPY (for each specified platform)
- Attention-grabbing headlines
- Compelling body copy
- Strong calls-to-action
- Hashtags where relevant

3. EMAIL DRAFTS
- Welcome/announcement email
- Educational/follow-up email
- Promotional email
- Complete with subject lines

4. SOCIAL MEDIA CONTENT
- 5-7 post ideas with full copy
- Platform-specific formatting
- Visual content suggestions

5. CONTENT CALENDAR
- Four weeks, a list of tasks per week

Return as structured JSON with this exact format:
{
  "campaign_strategy": {
    "overview": "2-3 paragraph strategy",
    "targeting": "Audience targeting approach",
    "positioning": "Brand positioning statement",
    "success_metrics": ["Metric 1", "Metric 2"]
  },
  "ad_copy": {
    "facebook": ["Headline 1", "Headline 2"],
    "instagram": ["Post 1", "Post 2"],
    "email": ["Subject: ...\\n\\nBody..."],
    "google_ads": ["Headline 1 | Headline 2"]
  },
  "email_drafts": [
    "Subject: ...\\n\\nBody content...",
    "Subject: ...\\n\\nBody content..."
  ],
  "social_media_posts": [
    "Platform: Post content with hashtags",
    "Platform: Post content with hashtags"
  ],
  "content_calendar": {
    "week_1": ["Task 1", "Task 2"],
    "week_2": ["Task 1", "Task 2"],
    "week_3": ["Task 1", "Task 2"],
    "week_4": ["Task 1", "Task 2"]
  },
  "key_messaging": ["Message 1", "Message 2", "Message 3"]
}

Make all content specific, actionable, and tailored to the context.`;
}

export function buildExtractionPrompt(message: string, contextText: string): string {
  return `Extract marketing campaign details from the user's message.

Already known:
${contextText || '(nothing yet)'}

User message: "${message}"

Return only JSON with any of these keys that the message states explicitly:
{
  "targetAudience": "string",
  "brandTone": "professional | casual | funny | inspirational | authoritative",
  "campaignGoals": ["brand_awareness | conversions | engagement | lead_generation"],
  "preferredPlatforms": ["facebook | instagram | twitter | linkedin | email | google_ads | tiktok | youtube"],
  "productDetails": "string",
  "competitors": ["string"],
  "trendingKeywords": ["string"],
  "productReferences": ["string"],
  "keyMessages": ["string"],
  "budget": "string",
  "timeline": "string",
  "uniqueSellingPoints": ["string"]
}

Leave out keys the message does not mention. Return {} when nothing applies.`;
}
