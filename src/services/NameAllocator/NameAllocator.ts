export interface NameAllocator {
  /**
   * 在 destinationDir 內為 desiredName 找一個尚未存在的路徑。
   * 候選名稱為 stem + suffix + ext，被佔用時依序嘗試 stem + suffix + "_1" + ext、"_2"…
   * 只做存在檢查，不建立檔案。
   *
   * @param reserved 本次執行已配置但可能尚未寫入（例如 dry run）的路徑
   */
  allocate(
    destinationDir: string,
    desiredName: string,
    suffix?: string,
    reserved?: ReadonlySet<string>
  ): Promise<string>;
}
