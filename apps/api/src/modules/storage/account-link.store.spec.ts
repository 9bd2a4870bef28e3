/**
 * Account Link Store Tests
 *
 * Runs against a temporary directory.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { ConfigService } from "@nestjs/config";
import { AppConfigService, validateEnv } from "../../common/config";
import type { Env } from "../../common/config";
import { AccountLinkStore } from "./account-link.store";

describe("AccountLinkStore", () => {
  let directory: string;
  let file: string;
  let store: AccountLinkStore;

  const linkedAt = new Date("2024-05-04T12:00:00.000Z");

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), "account-links-"));
    file = path.join(directory, "user_links.json");
    const env = validateEnv({ USER_LINKS_FILE: file });
    store = new AccountLinkStore(new AppConfigService(new ConfigService<Env, true>(env)));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it("should link an account and persist it", async () => {
    const link = await store.link(
      { userId: "u1", account: { name: "Alpha", tag: "EU1" }, displayName: "alpha_user", guildId: "g1" },
      linkedAt,
    );

    expect(link).toEqual({
      username: "Alpha",
      tag: "EU1",
      riotId: "Alpha#EU1",
      displayName: "alpha_user",
      linkedAt: "2024-05-04T12:00:00.000Z",
      guildId: "g1",
    });

    const stored: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    expect(stored).toEqual({ u1: link });
  });

  it("should replace an existing link", async () => {
    await store.link({ userId: "u1", account: { name: "Alpha", tag: "EU1" }, displayName: "a", guildId: null });
    await store.link({ userId: "u1", account: { name: "Bravo", tag: "NA1" }, displayName: "a", guildId: null });

    await expect(store.get("u1")).resolves.toMatchObject({ riotId: "Bravo#NA1" });
    await expect(store.list()).resolves.toHaveLength(1);
  });

  it("should unlink and report the removed link", async () => {
    await store.link({ userId: "u1", account: { name: "Alpha", tag: "EU1" }, displayName: "a", guildId: null });

    await expect(store.unlink("u1")).resolves.toMatchObject({ riotId: "Alpha#EU1" });
    await expect(store.unlink("u1")).resolves.toBeNull();
    await expect(store.get("u1")).resolves.toBeNull();
  });

  it("should list links by guild", async () => {
    await store.link({ userId: "u1", account: { name: "Alpha", tag: "EU1" }, displayName: "a", guildId: "g1" });
    await store.link({ userId: "u2", account: { name: "Bravo", tag: "EU1" }, displayName: "b", guildId: "g2" });
    await store.link({ userId: "u3", account: { name: "Charlie", tag: "EU1" }, displayName: "c", guildId: "g1" });

    const inGuild = await store.list("g1");

    expect(inGuild.map((entry) => entry.userId)).toEqual(["u1", "u3"]);
    await expect(store.list()).resolves.toHaveLength(3);
  });

  it("should treat a corrupt file as empty", async () => {
    await fs.writeFile(file, "[1, 2", "utf-8");

    await expect(store.list()).resolves.toEqual([]);
  });
});
