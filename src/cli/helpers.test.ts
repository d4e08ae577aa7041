import { numberButtons, parsePress, renderAction } from "./helpers";

describe("console chat helpers", () => {
  const keyboard = [
    [
      { text: "А", data: "letter:А" },
      { text: "Б", data: "letter:Б" },
    ],
    [{ text: "Открыть", webAppUrl: "https://example.test/app" }],
    [{ text: "⬅️ Назад", data: "mainMenu" }],
  ];

  it("numbers callback buttons row by row and lists mini-app links", () => {
    const rendered = numberButtons(keyboard, 12);

    expect(rendered.lines).toEqual([
      "  #1 А   #2 Б",
      "  [Открыть → https://example.test/app]",
      "  #3 ⬅️ Назад",
    ]);
    expect(rendered.buttons[2]).toEqual({ number: 3, text: "⬅️ Назад", data: "mainMenu", messageId: 12 });
  });

  it("renders an edit as plain text under a marker", () => {
    const rendered = renderAction({
      kind: "edit",
      conversationId: 1,
      messageId: 4,
      reply: { text: "<b>Меню</b> &amp; ещё" },
    });

    expect(rendered.lines).toEqual(["✎ (message 4)", "Меню & ещё", ""]);
  });

  it("resolves #N to a button and ignores other input", () => {
    const { buttons } = numberButtons(keyboard, 12);

    expect(parsePress("#2", buttons)?.data).toBe("letter:Б");
    expect(parsePress("#9", buttons)).toBeNull();
    expect(parsePress("Анна", buttons)).toBeNull();
  });
});
