import OpenAI from "openai";
import { LLMQueryAssistant } from "./llmQueryAssistant";
import { TRUNCATION_NOTICE } from "./queryAssistant";

// Mock OpenAI
jest.mock("openai");

const MockedOpenAI = OpenAI as jest.MockedClass<typeof OpenAI>;

describe("LLMQueryAssistant", () => {
  let mockCreate: jest.Mock;
  let assistant: LLMQueryAssistant;

  const headers = ["Имя", "Фамилия", "Дата рождения"];
  const rows = [
    ["Анна", "Иванова", "1990-05-01"],
    ["Борис", "Петров", "1985-11-20"],
  ];

  const completion = (content: string | null) => ({
    choices: [{ message: { content } }],
  });

  beforeEach(() => {
    jest.clearAllMocks();

    mockCreate = jest.fn();
    MockedOpenAI.mockImplementation(
      () =>
        ({
          chat: {
            completions: {
              create: mockCreate,
            },
          },
        }) as unknown as OpenAI
    );

    assistant = new LLMQueryAssistant({
      apiKey: "test-api-key",
      model: "gemini-2.5-flash",
      baseURL: "https://example.test/v1/",
      maxTokens: 1000,
      now: () => new Date(2024, 4, 9),
    });
  });

  describe("constructor", () => {
    it("creates the client with the key and endpoint", () => {
      expect(MockedOpenAI).toHaveBeenCalledWith({
        apiKey: "test-api-key",
        baseURL: "https://example.test/v1/",
      });
    });
  });

  describe("ask", () => {
    it("sends the question with today's date and the table", async () => {
      mockCreate.mockResolvedValue(completion("  В базе 2 человека.  "));

      const answer = await assistant.ask("Сколько человек?", headers, rows);

      expect(answer).toEqual({ text: "В базе 2 человека.", source: "assistant" });
      const request = mockCreate.mock.calls[0][0];
      expect(request.model).toBe("gemini-2.5-flash");
      expect(request.max_tokens).toBe(1000);
      const prompt: string = request.messages[0].content;
      expect(prompt).toContain("Сегодняшняя дата: 09.05.2024.");
      expect(prompt).toContain("| Анна | Иванова | 1990-05-01 |");
      expect(prompt).toContain("Вопрос пользователя: Сколько человек?");
    });

    it("truncates long answers with a notice", async () => {
      mockCreate.mockResolvedValue(completion("а".repeat(3500)));

      const answer = await assistant.ask("Расскажи всё", headers, rows);

      expect(answer.text).toBe("а".repeat(3000) + TRUNCATION_NOTICE);
    });

    it("falls back to a row count for counting questions when the API fails", async () => {
      mockCreate.mockRejectedValue(new Error("503 Service Unavailable"));

      const answer = await assistant.ask("Какое количество записей?", headers, rows);

      expect(answer).toEqual({ text: "📊 Всего записей в базе: 2", source: "fallback" });
    });

    it("falls back when the model returns no content", async () => {
      mockCreate.mockResolvedValue(completion(null));

      const answer = await assistant.ask("Какие колонки есть?", headers, rows);

      expect(answer).toEqual({ text: "🏷️ Количество колонок: 3", source: "fallback" });
    });
  });

  describe("summarize", () => {
    it("returns the model's summary", async () => {
      mockCreate.mockResolvedValue(completion("1. Имена и даты"));

      expect(await assistant.summarize(headers, rows)).toBe("1. Имена и даты");
    });

    it("returns a fixed message on failure", async () => {
      mockCreate.mockRejectedValue(new Error("timeout"));

      expect(await assistant.summarize(headers, rows)).toBe("Не удалось получить анализ таблицы.");
    });
  });
});
