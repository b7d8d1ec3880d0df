import { escapeHtml, unescapeHtml } from "../export/escape";

describe("escapeHtml", () => {
  it("escapes markup, quotes and template delimiters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a> {{ x }}`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt; &#123;&#123; x &#125;&#125;"
    );
  });

  it("leaves plain text alone", () => {
    expect(escapeHtml("Moisture 5% (max)")).toBe("Moisture 5% (max)");
  });
});

describe("unescapeHtml", () => {
  it("decodes named, decimal and hex entities", () => {
    expect(unescapeHtml("&#x41;&#66;&lt;&GT;&apos;")).toBe("AB<>'");
  });

  it("decodes in a single pass", () => {
    expect(unescapeHtml("&amp;lt;")).toBe("&lt;");
  });

  it("keeps unknown entities as they are", () => {
    expect(unescapeHtml("&nbsp;&copy;")).toBe("&nbsp;&copy;");
  });

  it.each([
    "&amp; already escaped &#39;",
    "{% for row in doc.items %}{{ row.qty }}{% endfor %}",
    "Größe: 5 µm, 中文",
    "<td class='x'>\"quoted\"</td>",
    "",
  ])("round-trips %j", (text) => {
    expect(unescapeHtml(escapeHtml(text))).toBe(text);
  });
});
