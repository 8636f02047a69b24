import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { parseSubscriberList, readSubscriberFile } from "./subscriberFile.js";

describe("parseSubscriberList", () => {
  it("takes the first field of each line and skips non-addresses", () => {
    const content = "a@x.com\n\nb@x.com,2024-01-01 10:00:00\r\nnot-an-email\n  c@x.com  \n";
    expect(parseSubscriberList(content)).toEqual(["a@x.com", "b@x.com", "c@x.com"]);
  });

  it("returns nothing for an empty file", () => {
    expect(parseSubscriberList("")).toEqual([]);
  });
});

describe("readSubscriberFile", () => {
  it("reads addresses from disk", async () => {
    const dir = await mkdtemp(join(tmpdir(), "subscribers-"));
    try {
      const path = join(dir, "subscribers.txt");
      await writeFile(path, "one@x.com\ntwo@x.com\n", "utf8");
      expect(await readSubscriberFile(path)).toEqual(["one@x.com", "two@x.com"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
