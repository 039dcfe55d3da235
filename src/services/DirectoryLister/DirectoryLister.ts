export type DirectoryEntry = {
  name: string;
  /** 完整路徑 */
  path: string;
  /** 所在資料夾 */
  parentPath: string;
  /** 符號連結一律為 false，不會被展開 */
  isDirectory: boolean;
  isSymbolicLink: boolean;
};

export interface DirectoryLister {
  /**
   * 列出資料夾的直接子項目，順序與檔案系統回傳一致。
   * 失敗時直接拋出檔案系統的錯誤。
   */
  list(dirPath: string): Promise<DirectoryEntry[]>;
}
