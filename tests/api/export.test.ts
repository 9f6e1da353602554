import { describe, expect, it } from "vitest";
import { csvColumnsFor, csvEscape, renderItemsCsv, toDatasetRecord } from "../../src/api/export";
import type { FieldValue, Item } from "../../src/extraction/types";

const item = (key: string, fields: Record<string, FieldValue>): Item => ({ key, fields });

describe("csvEscape", () => {
  it("quotes only values that need it", () => {
    expect(csvEscape("plain")).toBe("plain");
    expect(csvEscape('Says "hi", twice')).toBe('"Says ""hi"", twice"');
    expect(csvEscape("two\nlines")).toBe('"two\nlines"');
    expect(csvEscape(null)).toBe("");
    expect(csvEscape(undefined)).toBe("");
  });

  it("joins list values into one cell", () => {
    expect(csvEscape(["https://a.example.test/", "https://b.example.test/"])).toBe(
      "https://a.example.test/; https://b.example.test/",
    );
    expect(csvEscape(["x,y", "z"])).toBe('"x,y; z"');
  });
});

describe("renderItemsCsv", () => {
  it("writes a header row and one row per item", () => {
    const csv = renderItemsCsv([
      item("Ada", {
        name: "Ada",
        email: "ada@example.test",
        phone: null,
        profileUrl: "https://people.example.test/in/ada/",
        headline: "Engineer, Platform",
      }),
      item("Bo", { name: "Bo" }),
    ]);

    expect(csv).toBe(
      [
        "name,email,phone,profile_url,headline,location",
        'Ada,ada@example.test,,https://people.example.test/in/ada/,"Engineer, Platform",',
        "Bo,,,,,",
        "",
      ].join("\n"),
    );
  });

  it("accepts custom columns", () => {
    expect(renderItemsCsv([item("Ada", { name: "Ada" })], [{ header: "who", field: "name" }])).toBe(
      "who\nAda\n",
    );
  });
});

describe("csvColumnsFor", () => {
  it("adds profile contact columns only in profile_contact mode", () => {
    expect(csvColumnsFor("full").map((column) => column.header)).toEqual([
      "name",
      "email",
      "phone",
      "profile_url",
      "headline",
      "location",
    ]);
    expect(csvColumnsFor("profile_contact").map((column) => column.header)).toEqual([
      "name",
      "email",
      "phone",
      "profile_url",
      "headline",
      "location",
      "websites",
      "twitter",
    ]);
  });

  it("renders list-valued websites in profile_contact exports", () => {
    const csv = renderItemsCsv(
      [item("Ada", { name: "Ada", websites: ["https://ada.example.test/", "https://blog.example.test/"] })],
      csvColumnsFor("profile_contact"),
    );
    expect(csv).toBe(
      [
        "name,email,phone,profile_url,headline,location,websites,twitter",
        "Ada,,,,,,https://ada.example.test/; https://blog.example.test/,",
        "",
      ].join("\n"),
    );
  });
});

describe("toDatasetRecord", () => {
  it("flattens the key and fields next to the list id", () => {
    expect(toDatasetRecord(item("Ada", { name: "Ada", phone: null }), "42")).toEqual({
      list_id: "42",
      key: "Ada",
      name: "Ada",
      phone: null,
    });
  });
});
