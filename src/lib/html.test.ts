import { bold, escapeHtml, link, stripHtml } from "./html";

describe("html", () => {
  it("escapes markup characters and expands tabs", () => {
    expect(escapeHtml(`<Анна & "Борис">\t'`)).toBe("&lt;Анна &amp; &quot;Борис&quot;&gt;    &#039;");
  });

  it("escapes link targets but not link text", () => {
    expect(link("<b>x</b>", "https://example.test/?a=1&b=2")).toBe(
      '<a href="https://example.test/?a=1&amp;b=2"><b>x</b></a>'
    );
  });

  it("strips tags and unescapes entities for terminals", () => {
    expect(stripHtml(bold(escapeHtml("Tom & Jerry <3")))).toBe("Tom & Jerry <3");
  });
});
