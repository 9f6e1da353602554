import { describe, expect, it, vi } from "vitest";
import {
  extractWithFallback,
  findActionableControl,
  pickFirstValue,
} from "../../src/extraction/selector-fallback";
import { TransientElementError } from "../../src/runtime/errors";
import { SnapshotPageDriver } from "../../src/runtime/snapshot-driver";

const html = `
  <div class="panel">
    <h1 class="title"></h1>
    <h2 class="subtitle">Backup Name</h2>
    <span class="email">not an address</span>
    <span class="alt-email">sam@example.test</span>
    <a class="tel" href="tel:+1%20555%200100">call</a>
    <button disabled>Contact</button>
    <button style="display: none">Contact</button>
    <button class="primary">Contact now</button>
  </div>
`;

describe("pickFirstValue", () => {
  it("falls through empty and unqualified candidates in order", async () => {
    const driver = new SnapshotPageDriver(html);

    await expect(pickFirstValue(driver, [".missing", "h1.title", "h2.subtitle"])).resolves.toEqual({
      value: "Backup Name",
      selector: "h2.subtitle",
    });
    await expect(
      pickFirstValue(driver, [
        { locator: "span.email", contains: "@" },
        { locator: "span.alt-email", contains: "@" },
      ]),
    ).resolves.toEqual({ value: "sam@example.test", selector: "span.alt-email" });
  });

  it("never queries strategies after the first hit", async () => {
    const driver = new SnapshotPageDriver(html);
    const findFirst = vi.spyOn(driver, "findFirst");

    await pickFirstValue(driver, ["h2.subtitle", "span.alt-email"]);

    expect(findFirst).toHaveBeenCalledTimes(1);
    expect(findFirst).toHaveBeenCalledWith("h2.subtitle", undefined);
  });

  it("treats a detached element as not found for that strategy only", async () => {
    const driver = new SnapshotPageDriver(html);
    vi.spyOn(driver, "text").mockRejectedValueOnce(new TransientElementError("text"));

    await expect(pickFirstValue(driver, ["h2.subtitle", "span.alt-email"])).resolves.toEqual({
      value: "sam@example.test",
      selector: "span.alt-email",
    });
  });

  it("propagates unrelated driver failures", async () => {
    const driver = new SnapshotPageDriver(html);
    vi.spyOn(driver, "text").mockRejectedValueOnce(new Error("browser crashed"));

    await expect(pickFirstValue(driver, ["h2.subtitle"])).rejects.toThrow("browser crashed");
  });
});

describe("extractWithFallback", () => {
  it("returns every field with a selector trace", async () => {
    const driver = new SnapshotPageDriver(html);
    const output = await extractWithFallback(driver, {
      name: ["h1.title", "h2.subtitle"],
      phone: [{ locator: "a.tel", attribute: "href", scheme: "tel:" }],
      location: [".location"],
    });

    expect(output.fields).toEqual({ name: "Backup Name", phone: "+1 555 0100", location: null });
    expect(output.selectorTrace).toEqual({ name: "h2.subtitle", phone: "a.tel", location: null });
  });
});

describe("findActionableControl", () => {
  it("skips disabled and hidden candidates", async () => {
    const driver = new SnapshotPageDriver(html);
    const control = await findActionableControl(driver, [{ locator: "button", contains: "Contact" }]);

    expect(control?.attribs.class).toBe("primary");
  });

  it("returns null when nothing matches the text filter", async () => {
    const driver = new SnapshotPageDriver(html);

    await expect(
      findActionableControl(driver, [{ locator: "button", contains: "Load more" }]),
    ).resolves.toBeNull();
  });
});
