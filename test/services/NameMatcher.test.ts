import { describe, expect, test } from "vitest";

import { createNameMatcher } from "@/services/DepthLimitedWalker";

describe("createNameMatcher", () => {
  test("* 比對所有名稱", () => {
    const matches = createNameMatcher({ namePattern: "*" });
    expect(["a.txt", ".git", "無副檔名"].every(matches)).toBe(true);
  });

  test("win32 / darwin 預設不分大小寫", () => {
    expect(createNameMatcher({ namePattern: "*.DLL" }, "win32")("x.dll")).toBe(
      true
    );
    expect(createNameMatcher({ namePattern: "*.DLL" }, "darwin")("x.dll")).toBe(
      true
    );
  });

  test("linux 預設區分大小寫", () => {
    expect(createNameMatcher({ namePattern: "*.DLL" }, "linux")("x.dll")).toBe(
      false
    );
    expect(createNameMatcher({ namePattern: "*.DLL" }, "linux")("x.DLL")).toBe(
      true
    );
  });

  test("caseSensitive 優先於作業系統慣例", () => {
    const matches = createNameMatcher(
      { namePattern: "*.DLL", caseSensitive: true },
      "win32"
    );
    expect(matches("x.dll")).toBe(false);
  });

  test("只比對名稱，不跨越路徑分隔", () => {
    const matches = createNameMatcher({ namePattern: "a*" }, "linux");
    expect(matches("abc")).toBe(true);
    expect(matches("ba")).toBe(false);
  });

  test("[] 只比對字元集合，不比對字面相同的名稱", () => {
    const matches = createNameMatcher({ namePattern: "x[1]" }, "linux");
    expect(matches("x1")).toBe(true);
    expect(matches("x[1]")).toBe(false);
  });

  test("不支援 ! 反向比對", () => {
    const matches = createNameMatcher({ namePattern: "!*.txt" }, "linux");
    expect(matches("b.md")).toBe(false);
  });

  test("不展開大括號", () => {
    const matches = createNameMatcher({ namePattern: "{a,b}.txt" }, "linux");
    expect(matches("a.txt")).toBe(false);
    expect(matches("b.txt")).toBe(false);
  });
});
