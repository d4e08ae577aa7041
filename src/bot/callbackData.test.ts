import { decodeAction, encodeAction } from "./callbackData";

describe("callbackData", () => {
  it("encodes parametrized actions as kind:value", () => {
    expect(encodeAction({ type: "letter", letter: "Ж" })).toBe("letter:Ж");
    expect(encodeAction({ type: "person", rowNumber: 42 })).toBe("person:42");
    expect(encodeAction({ type: "choice", index: 3 })).toBe("choice:3");
    expect(encodeAction({ type: "adminReload" })).toBe("adminReload");
  });

  it("refuses payloads over the 64-byte limit", () => {
    expect(() => encodeAction({ type: "letter", letter: "Ж".repeat(40) })).toThrow(RangeError);
  });

  it("decodes what it encodes", () => {
    expect(decodeAction("letter:Ж")).toEqual({ type: "letter", letter: "Ж" });
    expect(decodeAction("month:12")).toEqual({ type: "month", month: 12 });
    expect(decodeAction("group:0")).toEqual({ type: "group", index: 0 });
    expect(decodeAction("save")).toEqual({ type: "save" });
  });

  it("returns null for foreign or malformed data", () => {
    expect(decodeAction("letter:АБ")).toBeNull();
    expect(decodeAction("person:x")).toBeNull();
    expect(decodeAction("field:-1")).toBeNull();
    expect(decodeAction("edit_field_Имя")).toBeNull();
  });
});
