import OpenAI from "openai";
import { format } from "date-fns";
import { AssistantError, errorMessage } from "../domain/errors";
import { Row } from "../domain/table";
import { logger } from "../lib/logger";
import {
  AssistantAnswer,
  QueryAssistant,
  formatTableMarkdown,
  heuristicAnswer,
  truncateAnswer,
} from "./queryAssistant";

const log = logger.child("assistant");

export interface LLMQueryAssistantOptions {
  apiKey: string;
  model: string;
  /** OpenAI-compatible endpoint; Gemini's by default in config */
  baseURL?: string;
  maxTokens: number;
  now?: () => Date;
}

// Columns and rows sent for a table summary
const SUMMARY_COLUMNS = 5;
const SUMMARY_ROWS = 50;

/**
 * LLMQueryAssistant answers roster questions through a chat-completions
 * model. Any API failure falls back to heuristicAnswer().
 */
export class LLMQueryAssistant implements QueryAssistant {
  private client: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly now: () => Date;

  constructor(options: LLMQueryAssistantOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
    });
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.now = options.now ?? (() => new Date());
  }

  async ask(
    question: string,
    headers: readonly string[],
    rows: readonly Row[]
  ): Promise<AssistantAnswer> {
    const prompt = `Ты аналитик базы данных.
Сегодняшняя дата: ${format(this.now(), "dd.MM.yyyy")}.

Структура таблицы (колонки):
${headers.join(", ")}

Данные таблицы:
${formatTableMarkdown(headers, rows)}

Вопрос пользователя: ${question}

Твоя задача:
1. Понимать вопросы о данных в таблице
2. Отвечать четко и по делу
3. Если информации нет в таблице - честно говори об этом
4. Форматируй ответ для Telegram (можно использовать emoji)
5. Если вопрос требует подсчета или анализа - делай его

Ответ должен быть на русском языке.
Не придумывай информацию, которой нет в таблице.`;

    try {
      const answer = await this.complete(prompt);
      log.info("Question answered", { rows: rows.length, length: answer.length });
      return { text: truncateAnswer(answer), source: "assistant" };
    } catch (error) {
      log.error("Assistant failed, using fallback", error);
      return { text: heuristicAnswer(question, headers, rows), source: "fallback" };
    }
  }

  async summarize(headers: readonly string[], rows: readonly Row[]): Promise<string> {
    const sample = formatTableMarkdown(
      headers.slice(0, SUMMARY_COLUMNS),
      rows.slice(0, SUMMARY_ROWS).map((row) => row.slice(0, SUMMARY_COLUMNS))
    );
    const prompt = `Дана таблица церковной базы данных.

Колонки: ${headers.join(", ")}

Примеры данных:
${sample}

Сделай краткий анализ:
1. Основная структура данных
2. Какие типы информации хранятся
3. Предложения по улучшению (если есть)

Отвечай кратко, по пунктам.`;

    try {
      return truncateAnswer(await this.complete(prompt));
    } catch (error) {
      log.error("Table summary failed", error);
      return "Не удалось получить анализ таблицы.";
    }
  }

  private async complete(prompt: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: 0.3,
        top_p: 0.8,
        max_tokens: this.maxTokens,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw new AssistantError(`Completion request failed: ${errorMessage(error)}`, { cause: error });
    }

    const answer = content?.trim();
    if (!answer) {
      throw new AssistantError("No response from model");
    }
    return answer;
  }
}
