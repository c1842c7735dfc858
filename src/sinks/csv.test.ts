import { describe, it, expect } from "vitest";
import { escapeCsvField, renderItemsCsv } from "./csv";
import { renderItemsJson } from "./json";
import { createTestItem } from "../test-utils/fixtures";

const HEADER = "identity,title,description,link,imageUrl,category,publishedAt,source";

describe("escapeCsvField", () => {
  it("should leave plain values unquoted", () => {
    expect(escapeCsvField("plain value")).toBe("plain value");
    expect(escapeCsvField("")).toBe("");
  });

  it("should quote values with delimiters, quotes or line breaks", () => {
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("one\ntwo")).toBe('"one\ntwo"');
    expect(escapeCsvField("one\r\ntwo")).toBe('"one\r\ntwo"');
  });
});

describe("renderItemsCsv", () => {
  it("should render a header and one CRLF-terminated row per item", () => {
    const csv = renderItemsCsv([
      createTestItem({ title: 'Say "hi", world', description: "Line1\nLine2" }),
      createTestItem({
        identity: "https://example.com/posts/2",
        link: "https://example.com/posts/2",
        imageUrl: "https://img.example.com/2.png",
        category: "News",
        publishedAt: null,
      }),
    ]);

    expect(csv).toBe(
      [
        HEADER,
        'https://example.com/posts/1,"Say ""hi"", world","Line1\nLine2",https://example.com/posts/1,,,2024-01-15T10:00:00.000Z,example.com',
        "https://example.com/posts/2,Test Item,A test description,https://example.com/posts/2,https://img.example.com/2.png,News,,example.com",
        "",
      ].join("\r\n"),
    );
  });

  it("should render only the header for no items", () => {
    expect(renderItemsCsv([])).toBe(`${HEADER}\r\n`);
  });
});

describe("renderItemsJson", () => {
  it("should render items as an array of records", () => {
    const json = renderItemsJson([createTestItem({ category: "News" })]);

    expect(JSON.parse(json)).toEqual([
      {
        identity: "https://example.com/posts/1",
        title: "Test Item",
        description: "A test description",
        link: "https://example.com/posts/1",
        imageUrl: null,
        category: "News",
        publishedAt: "2024-01-15T10:00:00.000Z",
        source: "example.com",
      },
    ]);
    expect(json.endsWith("]\n")).toBe(true);
  });

  it("should render an empty array for no items", () => {
    expect(renderItemsJson([])).toBe("[]\n");
  });
});
