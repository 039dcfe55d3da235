export type RootSpecification =
  | { kind: "pattern"; text: string }
  | { kind: "literal"; text: string };

export type ConcreteRoot = {
  /** 絕對路徑 */
  path: string;
  isDirectory: boolean;
};

export type FilterCriteria = {
  /** glob 樣式，只比對名稱 */
  namePattern: string;
  /** 只輸出非資料夾項目 */
  entriesOnly: boolean;
  /** 未指定時依作業系統慣例：win32 / darwin 不分大小寫 */
  caseSensitive?: boolean;
};

export type OutputFormat = "path" | "json";

export type CaseMode = "host" | "sensitive" | "insensitive";
