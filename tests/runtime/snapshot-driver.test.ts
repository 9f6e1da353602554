import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { buildRuntimeConfig } from "../../src/config";
import { HarvestService } from "../../src/extraction/service";
import { SnapshotPageDriver } from "../../src/runtime/snapshot-driver";

const fixture = (name: string): string =>
  readFileSync(path.join(process.cwd(), "fixtures", "snapshots", name), "utf8");

describe("SnapshotPageDriver", () => {
  const html = `
    <section>
      <div hidden><button class="a">Hidden by attribute</button></div>
      <div style="visibility: hidden"><button class="b">Hidden by style</button></div>
      <button class="c" aria-disabled="true">Disabled</button>
      <input class="search" />
      <ul><li data-id="1"> One </li><li data-id="2">Two</li></ul>
    </section>
  `;

  it("queries with CSS locators inside an optional scope", async () => {
    const driver = new SnapshotPageDriver(html);
    const [list] = await driver.findAll("ul");
    const items = await driver.findAll("li", list);

    expect(items).toHaveLength(2);
    await expect(driver.attribute(items[1], "data-id")).resolves.toBe("2");
    await expect(driver.text(items[0])).resolves.toBe(" One ");
    await expect(driver.findFirst("table")).resolves.toBeNull();
  });

  it("derives visibility from the element and its ancestors", async () => {
    const driver = new SnapshotPageDriver(html);
    const [a, b, c] = await Promise.all([
      driver.findFirst("button.a"),
      driver.findFirst("button.b"),
      driver.findFirst("button.c"),
    ]);
    if (!a || !b || !c) throw new Error("fixture buttons missing");

    await expect(driver.isDisplayed(a)).resolves.toBe(false);
    await expect(driver.isDisplayed(b)).resolves.toBe(false);
    await expect(driver.isDisplayed(c)).resolves.toBe(true);
    await expect(driver.isEnabled(c)).resolves.toBe(false);
  });

  it("reports the configured landing URL and never scrolls", async () => {
    const driver = new SnapshotPageDriver(html, { landingUrl: "https://example.test/landed" });
    await driver.navigate("https://example.test/requested");

    await expect(driver.currentUrl()).resolves.toBe("https://example.test/landed");
    await expect(driver.scrollContainer()).resolves.toEqual({ scrolled: false, offset: 0, extent: 0 });
    await expect(driver.waitFor("li", 1000)).resolves.toBe(true);
    await expect(driver.waitFor("table", 1000)).resolves.toBe(false);
  });

  it("records typed values and pauses", async () => {
    const driver = new SnapshotPageDriver(html);
    const input = await driver.findFirst("input.search");
    if (!input) throw new Error("fixture input missing");

    await driver.typeText(input, "query");
    await driver.sleep(250);
    await driver.sleep(-5);

    await expect(driver.attribute(input, "value")).resolves.toBe("query");
    expect(driver.totalSleptMs).toBe(250);
  });

  it("harvests the saved applicant snapshot with the built-in profile", async () => {
    const driver = new SnapshotPageDriver(fixture("hiring-applicants-contact.html"));
    const service = new HarvestService({ runtime: buildRuntimeConfig({}, {}) });

    const outcome = await service.harvest(driver, {
      listId: "1001",
      maxItems: 1,
      perItemDelayMs: 0,
      filter: "GOOD_FIT",
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result.stopReason).toBe("max_items");
    expect(outcome.result.items).toEqual([
      {
        key: "Jane Placeholder",
        fields: {
          name: "Jane Placeholder",
          headline: "Staff Engineer at Example Co",
          location: "Berlin, Germany",
          profileUrl: "https://www.linkedin.com/in/jane-placeholder/",
          phone: "+49 555 0100",
          email: "jane.placeholder@example.com",
        },
      },
    ]);
    expect(driver.activations).toBe(3);
  });

  it("stops at the landing check on a login wall snapshot", async () => {
    const driver = new SnapshotPageDriver(fixture("hiring-applicants-login-wall.html"), {
      landingUrl: "https://www.linkedin.com/uas/login",
    });
    const service = new HarvestService({ runtime: buildRuntimeConfig({}, {}) });

    const outcome = await service.harvest(driver, { listId: "1001" });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("AccessDenied");
    expect(outcome.error.context.reason).toBe("login_wall");
  });
});
