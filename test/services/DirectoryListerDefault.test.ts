import { mkdir, rm, symlink, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { DirectoryListerDefault } from "@/services/DirectoryLister";

const tmpDir = path.resolve("test/tmp/lister");

describe("DirectoryListerDefault", () => {
  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(path.join(tmpDir, "sub"), { recursive: true });
    await writeFile(path.join(tmpDir, "a.txt"), "a");
    await writeFile(path.join(tmpDir, "sub", "b.txt"), "b");
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("只列出直接子項目", async () => {
    const lister = new DirectoryListerDefault();
    const entries = await lister.list(tmpDir);
    const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
    expect(sorted).toEqual([
      {
        name: "a.txt",
        path: path.join(tmpDir, "a.txt"),
        parentPath: tmpDir,
        isDirectory: false,
        isSymbolicLink: false,
      },
      {
        name: "sub",
        path: path.join(tmpDir, "sub"),
        parentPath: tmpDir,
        isDirectory: true,
        isSymbolicLink: false,
      },
    ]);
  });

  test("不存在的路徑拋出 ENOENT", async () => {
    const lister = new DirectoryListerDefault();
    await expect(
      lister.list(path.join(tmpDir, "no_such_dir"))
    ).rejects.toMatchObject({ code: "ENOENT" });
  });

  test.skipIf(process.platform === "win32")(
    "符號連結不視為資料夾",
    async () => {
      const linkDir = path.join(tmpDir, "links");
      await mkdir(linkDir, { recursive: true });
      await symlink(path.join(tmpDir, "sub"), path.join(linkDir, "to-sub"));

      const lister = new DirectoryListerDefault();
      const entries = await lister.list(linkDir);
      expect(entries).toEqual([
        {
          name: "to-sub",
          path: path.join(linkDir, "to-sub"),
          parentPath: linkDir,
          isDirectory: false,
          isSymbolicLink: true,
        },
      ]);
    }
  );
});
