import { Row } from "../domain/table";
import { AssistantAnswer, QueryAssistant, heuristicAnswer } from "./queryAssistant";

/**
 * HeuristicQueryAssistant answers from keywords alone.
 * Used when no model API key is configured, and in tests.
 */
export class HeuristicQueryAssistant implements QueryAssistant {
  async ask(
    question: string,
    headers: readonly string[],
    rows: readonly Row[]
  ): Promise<AssistantAnswer> {
    return { text: heuristicAnswer(question, headers, rows), source: "fallback" };
  }

  async summarize(headers: readonly string[], rows: readonly Row[]): Promise<string> {
    return `Колонки: ${headers.join(", ")}\nЗаписей: ${rows.length}`;
  }
}
