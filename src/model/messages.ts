// ============================================================================
// Prompt Templates
// ============================================================================

/**
 * Matching prompt. Profiles are substituted as pretty-printed JSON.
 */
export const MATCHING_PROMPT_TEMPLATE = `You are a compassionate AI helping match children with loving families.
Analyze the following profiles and provide matching recommendations:

Child Profile: {{{childProfile}}}
Family Profile: {{{familyProfile}}}

Consider:
- Compatibility factors (interests, values, lifestyle)
- Special needs accommodations
- Age appropriateness
- Geographic considerations
- Family dynamics and preferences

Provide a matching score (0-100) and detailed reasoning.
Be empathetic and focus on the child's best interests.
`

export type ChatContext = 'child' | 'family' | 'social_worker' | 'general'

export const CHAT_CONTEXTS: readonly ChatContext[] = ['child', 'family', 'social_worker', 'general']

export const CHAT_SYSTEM_PROMPTS: Record<ChatContext, string> = {
    child: `You are a warm, caring counselor speaking with a child who may be looking for a new home.
Be gentle, encouraging, and age-appropriate. Use simple language and be emotionally supportive.
Focus on hope, safety, and helping them feel valued and loved.`,
    family: `You are a knowledgeable family counselor helping prospective adoptive/foster families.
Provide thoughtful guidance about the adoption/foster process, child needs, and family preparation.
Be encouraging while being realistic about challenges.`,
    social_worker: `You are an experienced social work supervisor providing guidance to caseworkers.
Offer professional insights about child welfare, family assessment, and best practices in placement decisions.`,
    general: `You are a compassionate AI assistant helping with child-family matching.
Provide helpful, empathetic responses focused on the wellbeing of children and families.`,
}

export const CHAT_PROMPT_TEMPLATE = `{{{systemPrompt}}}

User: {{{message}}}

Assistant:`

export const CHAT_EMPTY_RESPONSE = 'I apologize, but I had trouble generating a response. Please try again.'
export const CHAT_CONNECTION_MESSAGE =
    "I'm having trouble connecting right now. Please check if Ollama is running and try again."
export const CHAT_FAILURE_MESSAGE = "I apologize, but I'm experiencing technical difficulties. Please try again in a moment."

// ============================================================================
// Report Templates
// ============================================================================

export const MATCH_LIST_TEMPLATE = `{{#each matches}}
Match #{{rank}}: {{familyType}} - Score: {{score}}%
{{/each}}
`

export const FAMILY_LABEL_TEMPLATE = '{{familyType}} - {{ageRange}} - {{location}}'

export const FAMILY_DETAILS_TEMPLATE = `Family Details

Family ID: {{id}}
Type: {{familyType}}
Age Range: {{ageRange}}
Location: {{location}}

Interests:
{{#each interests}}
• {{this}}
{{/each}}

Specializations:
{{#each specializations}}
• {{this}}
{{/each}}

Home Type: {{homeType}}
Pets: {{pets}}
Values: {{values}}
`

export const FOLLOW_UP_RECOMMENDATIONS: readonly string[] = [
    'Consider scheduling a supervised meeting',
    'Discuss specific needs and expectations',
    "Review family's experience with similar situations",
    'Plan gradual integration if match proceeds',
]

export const COMPATIBILITY_ANALYSIS_TEMPLATE = `AI Compatibility Analysis

Child Profile:
• Age: {{child.age}} years
• Interests: {{child.interests}}
• Personality: {{child.personality}}
• Special Needs: {{child.specialNeeds}}

Family Profile:
• Type: {{family.familyType}}
• Age Range: {{family.ageRange}}
• Interests: {{join family.interests}}
• Specializations: {{join family.specializations}}
• Values: {{family.values}}

Match Score: {{recommendation.matchScore}}%

AI Reasoning:
{{recommendation.reasoning}}

Recommendations:
{{#each followUps}}
• {{this}}
{{/each}}
`
