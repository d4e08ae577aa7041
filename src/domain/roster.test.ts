import { DEFAULT_ROSTER_SCHEMA } from "../config";
import { NotFoundError } from "./errors";
import {
  birthdayIndex,
  cardFields,
  draftFromRow,
  firstLetters,
  homeroomGroups,
  peopleByLetter,
  rowFromDraft,
  rowNumberFromLabel,
} from "./roster";
import { TableSnapshot } from "./table";

const schema = DEFAULT_ROSTER_SCHEMA;
const HEADER = ["Имя", "Фамилия", "Дата рождения", "Домашка", "Статус"];

const table = (...rows: string[][]) => new TableSnapshot("Main", [HEADER, ...rows]);

describe("firstLetters", () => {
  it("collects distinct uppercase first letters in order", () => {
    const snapshot = table(["вера"], ["Анна"], ["Борис"], ["анатолий"], ["1Test"], [""], ["Ёжик"]);

    expect(firstLetters(snapshot, schema)).toEqual(["Ё", "А", "Б", "В"]);
  });

  it("requires the first-name column", () => {
    const snapshot = new TableSnapshot("Main", [["Фамилия"], ["Иванова"]]);

    expect(() => firstLetters(snapshot, schema)).toThrow(NotFoundError);
  });
});

describe("peopleByLetter", () => {
  it("adds birth dates only to namesakes", () => {
    const snapshot = table(
      ["Анна", "Иванова", "1990-05-01"],
      ["Борис", "Петров", ""],
      ["Анна", "Иванова", "1995-03-02"],
      ["Анна", "Петрова", "1988-01-01"]
    );

    expect(peopleByLetter(snapshot, schema, "а")).toEqual([
      {
        label: "Анна Иванова (р. 01.05.1990)",
        rowNumber: 2,
        display: "Анна Иванова (р. 01.05.1990) [#2]",
      },
      {
        label: "Анна Иванова (р. 02.03.1995)",
        rowNumber: 4,
        display: "Анна Иванова (р. 02.03.1995) [#4]",
      },
      { label: "Анна Петрова", rowNumber: 5, display: "Анна Петрова [#5]" },
    ]);
  });

  it("matches namesakes case-insensitively", () => {
    const snapshot = table(["Анна", "иванова", "1990-05-01"], ["анна", "Иванова", ""]);

    expect(peopleByLetter(snapshot, schema, "А").map((person) => person.label)).toEqual([
      "Анна иванова (р. 01.05.1990)",
      "анна Иванова",
    ]);
  });
});

describe("rowNumberFromLabel", () => {
  it("reads the trailing row tag", () => {
    expect(rowNumberFromLabel("Анна Иванова [#12]")).toBe(12);
    expect(rowNumberFromLabel("Анна [#12] Иванова")).toBeNull();
    expect(rowNumberFromLabel("Анна")).toBeNull();
  });
});

describe("cardFields", () => {
  it("lists non-empty fields with dates reformatted", () => {
    const snapshot = table(["Анна", "", "1990-05-01", "Гоша / Zion"]);

    expect(cardFields(snapshot, schema, 2)).toEqual([
      { header: "Имя", value: "Анна" },
      { header: "Дата рождения", value: "01.05.1990" },
      { header: "Домашка", value: "Гоша / Zion" },
    ]);
  });

  it("rejects the header row and rows past the end", () => {
    const snapshot = table(["Анна"]);

    expect(() => cardFields(snapshot, schema, 1)).toThrow(NotFoundError);
    expect(() => cardFields(snapshot, schema, 3)).toThrow(NotFoundError);
  });
});

describe("draftFromRow", () => {
  it("keeps the raw non-empty cells", () => {
    const snapshot = table(["Анна", " ", "1990-05-01"]);

    expect(draftFromRow(snapshot, 2)).toEqual({ Имя: "Анна", "Дата рождения": "1990-05-01" });
  });
});

describe("rowFromDraft", () => {
  it("orders by header, blanks missing fields and stores dotted dates as ISO", () => {
    const row = rowFromDraft(
      ["Имя", "Фамилия", "Дата рождения"],
      { Имя: "Иван", "Дата рождения": "04.05.1998" },
      schema.dateColumns
    );

    expect(row).toEqual(["Иван", "", "1998-05-04"]);
  });

  it("leaves date-shaped text in other columns alone", () => {
    const row = rowFromDraft(["Имя", "Заметка"], { Имя: "Иван", Заметка: "04.05.1998" }, schema.dateColumns);

    expect(row).toEqual(["Иван", "04.05.1998"]);
  });
});

describe("birthdayIndex", () => {
  it("groups by month, orders by day and skips invalid dates", () => {
    const snapshot = table(
      ["Анна", "Иванова", "1990-05-21"],
      ["Борис", "Петров", "03.05.1985"],
      ["Вера", "Смирнова", "1990-02-30"],
      ["Глеб", "Орлов", "когда-то"],
      ["Дарья", "Котова", "12/01/2001"]
    );

    const index = birthdayIndex(snapshot, schema);

    expect(index.get(5)).toEqual([
      { name: "Борис Петров", day: 3, year: 1985, rowNumber: 3 },
      { name: "Анна Иванова", day: 21, year: 1990, rowNumber: 2 },
    ]);
    expect(index.get(1)).toEqual([{ name: "Дарья Котова", day: 12, year: 2001, rowNumber: 6 }]);
    expect(index.get(2)).toBeUndefined();
    expect([...index.keys()].sort()).toEqual([1, 5]);
  });
});

describe("homeroomGroups", () => {
  const today = new Date(2024, 5, 1);

  it("puts blank groups under the unassigned group and keeps unknown groups", () => {
    const snapshot = table(
      ["Яна", "Белова", "2000-06-02", "", "активный"],
      ["Анна", "Иванова", "2000-06-01", "", ""],
      ["Борис", "Петров", "неизвестно", "Новая группа", "вип"],
      ["Вера", "Смирнова", "1990-01-01", "Лия / Heaven", "неактивный"]
    );

    expect(homeroomGroups(snapshot, schema, today)).toEqual([
      {
        name: "Лия / Heaven",
        members: [{ name: "Вера Смирнова", rowNumber: 5, age: 34, status: "неактивный" }],
      },
      {
        name: "Не распределен",
        members: [
          { name: "Анна Иванова", rowNumber: 3, age: 24, status: "" },
          { name: "Яна Белова", rowNumber: 2, age: 23, status: "активный" },
        ],
      },
      {
        name: "Новая группа",
        members: [{ name: "Борис Петров", rowNumber: 4, age: null, status: "вип" }],
      },
    ]);
  });

  it("omits the unassigned group when nobody lands in it", () => {
    const snapshot = table(["Вера", "Смирнова", "1990-01-01", "Лия / Heaven", ""]);

    expect(homeroomGroups(snapshot, schema, today).map((group) => group.name)).toEqual([
      "Лия / Heaven",
    ]);
  });

  it("returns nothing when a required column is missing", () => {
    const snapshot = new TableSnapshot("Main", [["Имя", "Фамилия"], ["Анна", "Иванова"]]);

    expect(homeroomGroups(snapshot, schema, today)).toEqual([]);
  });
});
