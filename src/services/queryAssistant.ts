import { Row } from "../domain/table";

export type AnswerSource = "assistant" | "fallback";

export interface AssistantAnswer {
  text: string;
  /** "fallback" when the answer came from keyword heuristics */
  source: AnswerSource;
}

export interface QueryAssistant {
  /**
   * Answer a free-text question about the main table.
   * Never rejects: a failing backend degrades to a heuristic answer.
   */
  ask(question: string, headers: readonly string[], rows: readonly Row[]): Promise<AssistantAnswer>;

  /** Short description of the table's structure and contents. */
  summarize(headers: readonly string[], rows: readonly Row[]): Promise<string>;
}

export const MAX_ANSWER_LENGTH = 3000;

export const TRUNCATION_NOTICE = "...\n\n⚠️ Ответ был сокращен из-за ограничений Telegram";

export function truncateAnswer(answer: string, limit = MAX_ANSWER_LENGTH): string {
  if (answer.length <= limit) return answer;
  return answer.slice(0, limit) + TRUNCATION_NOTICE;
}

/** Render rows as a markdown table under the given headers. */
export function formatTableMarkdown(headers: readonly string[], rows: readonly Row[]): string {
  let table = `| ${headers.join(" | ")} |\n`;
  table += "|---".repeat(headers.length) + "|\n";
  for (const row of rows) {
    table += `| ${row.join(" | ")} |\n`;
  }
  return table;
}

/**
 * Keyword answer used when no model is reachable: counts for
 * "how many" questions, the column count for column questions.
 */
export function heuristicAnswer(
  question: string,
  headers: readonly string[],
  rows: readonly Row[]
): string {
  const text = question.toLowerCase();
  if (text.includes("сколько") || text.includes("количество")) {
    return `📊 Всего записей в базе: ${rows.length}`;
  }
  if (text.includes("столбц") || text.includes("колонк")) {
    return `🏷️ Количество колонок: ${headers.length}`;
  }
  return "🤖 Не удалось получить ответ от AI. Попробуйте другой вопрос.";
}
