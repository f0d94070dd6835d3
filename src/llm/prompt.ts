import { PromptTemplate } from "@langchain/core/prompts";
import type { NarrativeStyle } from "../types";

export const NO_RELEVANT_INFORMATION = "No relevant information found.";

const routingTemplate = PromptTemplate.fromTemplate(
  `You are an expert query routing assistant for a Dungeons & Dragons knowledge base. Classify the user's question into one of two categories based on its intent: 'structured' or 'unstructured'.

'structured' questions ask for specific, factual data about game entities such as monster statistics. They often involve numbers, lists, comparisons or filtering.
Examples:
- "What is a Beholder's armor class?"
- "List all monsters with resistance to cold damage."
- "Which dragon has more hit points, an adult red or an adult black?"
- "Show me all CR 5 monsters."

'unstructured' questions ask about rules, lore, spell descriptions, or ask for creative narrative content. They are explanatory or generative in nature.
Examples:
- "How does the grappling condition work?"
- "Explain how spell slots work."
- "What is the history of the elves?"
- "Describe a tavern scene."

Output only the single word 'structured' or 'unstructured' and nothing else.

User Question: {question}
Classification:`
);

const sqlTemplate = PromptTemplate.fromTemplate(
  `You are a PostgreSQL expert for D&D monster data.

Database Schema:
{schema}

IMPORTANT NOTES:
- Query only the table {table}; write a single read-only SELECT statement.
- challenge_rating is TEXT, not a number. Compare exact values as strings ('1/4', '5').
- For numeric CR comparisons use CAST(NULLIF(split_part(challenge_rating, '/', 1), '') AS NUMERIC) / COALESCE(CAST(NULLIF(split_part(challenge_rating, '/', 2), '') AS NUMERIC), 1).
- Use ILIKE for text searches in abilities, special_abilities, damage_resistances, etc.
- Return only the SQL, without explanation.
{feedback}
User Question: {question}
SQL query:`
);

const feedbackTemplate = PromptTemplate.fromTemplate(
  `
Your previous attempt failed. Do not repeat it.
Previous query: {previousQuery}
Database error: {error}
`
);

const structuredAnswerTemplate = PromptTemplate.fromTemplate(
  `You are a helpful Dungeon Master assistant with access to D&D monster data.

The user asked: "{question}"

Database results:
{retrievedData}

Provide a clear, helpful answer based on this data:`
);

const unstructuredAnswerTemplate = PromptTemplate.fromTemplate(
  `You are a master Dungeon Master, an expert in D&D 5th Edition.

The user asked: "{question}"

Relevant D&D information:
{retrievedDocuments}

Provide a comprehensive and engaging answer. If the information above does not cover the question, say so instead of inventing rules:`
);

const narrationTemplate = PromptTemplate.fromTemplate(
  `You are a master Dungeon Master and expert storyteller.
Your tone is {style}, engaging, and immersive.

Create narrative content for: "{prompt}"

Use vivid descriptions and sensory details. Keep it suitable for D&D games.

Narrative:`
);

export function buildRoutingPrompt(question: string): Promise<string> {
  return routingTemplate.format({ question });
}

export interface PreviousAttempt {
  query?: string;
  error: string;
}

export async function buildSqlPrompt(input: {
  question: string;
  schema: string;
  table: string;
  previous?: PreviousAttempt;
}): Promise<string> {
  const feedback = input.previous
    ? await feedbackTemplate.format({
        previousQuery: input.previous.query ?? "(no query was produced)",
        error: input.previous.error
      })
    : "";
  return sqlTemplate.format({
    question: input.question,
    schema: input.schema,
    table: input.table,
    feedback
  });
}

export function buildStructuredAnswerPrompt(question: string, retrievedData: string): Promise<string> {
  return structuredAnswerTemplate.format({ question, retrievedData });
}

export function buildUnstructuredAnswerPrompt(question: string, retrievedDocuments: string): Promise<string> {
  return unstructuredAnswerTemplate.format({ question, retrievedDocuments });
}

export function buildNarrationPrompt(prompt: string, style: NarrativeStyle): Promise<string> {
  return narrationTemplate.format({ prompt, style });
}
