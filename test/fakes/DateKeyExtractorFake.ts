import type { DateKeyExtractor } from "@/services/DateKeyExtractor/DateKeyExtractor";
import type { CategoryLabel } from "@/types";

export class DateKeyExtractorFake implements DateKeyExtractor {
  private readonly fallback: string;
  private readonly keys = new Map<string, string>();
  readonly calls: Array<{ filePath: string; category: CategoryLabel }> = [];

  constructor(fallback = "2024-01-01") {
    this.fallback = fallback;
  }

  async dateKey(filePath: string, category: CategoryLabel) {
    this.calls.push({ filePath, category });
    return this.keys.get(filePath) ?? this.fallback;
  }

  setDateKey(filePath: string, dateKey: string) {
    this.keys.set(filePath, dateKey);
  }
}
