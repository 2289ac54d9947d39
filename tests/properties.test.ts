import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { parseProperties, setProperty, setPropertyInText } from "../src/patch/properties.js";

describe("gradle.properties helpers", () => {
  test("parses both separators, skips comments and keeps the last definition", () => {
    const props = parseProperties(["# comment", "! also a comment", "a=1", "b: 2", "a = 3", ""].join("\n"));

    expect([...props.entries()]).toEqual([
      ["a", "3"],
      ["b", "2"]
    ]);
  });

  test("replaces every definition of an existing key", () => {
    expect(setPropertyInText("foo=1.0\nbar=x\nfoo = 1.1\n", "foo", "2.0")).toEqual({
      text: "foo=2.0\nbar=x\nfoo=2.0\n",
      replaced: true
    });
  });

  test("keeps CRLF line endings when replacing", () => {
    expect(setPropertyInText("foo=1.0\r\nbar=x\r\n", "foo", "2.0").text).toBe("foo=2.0\r\nbar=x\r\n");
  });

  test("appends a missing key on its own line", () => {
    expect(setPropertyInText("bar=x", "foo", "2.0")).toEqual({ text: "bar=x\nfoo=2.0\n", replaced: false });
    expect(setPropertyInText("", "foo", "2.0")).toEqual({ text: "foo=2.0\n", replaced: false });
  });

  test("does not touch commented-out definitions", () => {
    expect(setPropertyInText("#foo=0.9\n", "foo", "2.0").text).toBe("#foo=0.9\nfoo=2.0\n");
  });

  test("setProperty creates the file and then updates it in place", async () => {
    const dir = await mkdtemp(join(tmpdir(), "gradle-mend-props-"));
    const filePath = join(dir, "gradle.properties");

    expect(await setProperty(filePath, "kotlinVersion", "1.9.0")).toEqual({ created: true, replaced: false });
    expect(await setProperty(filePath, "kotlinVersion", "1.9.24")).toEqual({ created: false, replaced: true });
    expect(await readFile(filePath, "utf8")).toBe("kotlinVersion=1.9.24\n");
  });

  test("setProperty rejects keys that cannot be written as a property", async () => {
    const dir = await mkdtemp(join(tmpdir(), "gradle-mend-props-"));
    const filePath = join(dir, "gradle.properties");
    await writeFile(filePath, "a=1\n", "utf8");

    await expect(setProperty(filePath, "bad key", "1")).rejects.toThrow('Invalid property name: "bad key"');
    expect(await readFile(filePath, "utf8")).toBe("a=1\n");
  });
});
