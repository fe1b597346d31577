import { describe, expect, it } from "vitest";
import { decodeHtmlEntities } from "../../html.js";

describe("decodeHtmlEntities", () => {
  it("decodes escaped query separators", () => {
    expect(decodeHtmlEntities("https://shop.test/search?q=a&amp;page=2")).toBe(
      "https://shop.test/search?q=a&page=2",
    );
  });

  it("decodes double quotes and angle brackets", () => {
    expect(decodeHtmlEntities("&quot;x&quot; &lt;b&gt;")).toBe('"x" <b>');
  });

  it("decodes numeric references to the special characters", () => {
    expect(decodeHtmlEntities("&#38;&#34;&#x3C;&#X3e;&#060;")).toBe('&"<><');
  });

  it("leaves single-quote entities encoded", () => {
    expect(decodeHtmlEntities("&#039;y&#39; &apos;z&#x27;")).toBe("&#039;y&#39; &apos;z&#x27;");
  });

  it("decodes a single level only", () => {
    expect(decodeHtmlEntities("&amp;lt;")).toBe("&lt;");
  });

  it("leaves unknown and upper-case entities alone", () => {
    expect(decodeHtmlEntities("&nbsp;&copy;&AMP;&#65;")).toBe("&nbsp;&copy;&AMP;&#65;");
  });
});
