/** サマリーページが取得できない（HTTPエラー / 必要な要素がない） */
export class SummaryPageNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SummaryPageNotFoundError";
  }
}

/** ヘッダー or サマリーテーブルが欠けている。呼び出し側では PageNotFound と同じ扱い */
export class MalformedSummaryError extends SummaryPageNotFoundError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedSummaryError";
  }
}

/** SummaryPageGroup に SummaryPage 以外を追加しようとした */
export class InvalidAppendError extends TypeError {
  constructor(message = "Can only append SummaryPage objects.") {
    super(message);
    this.name = "InvalidAppendError";
  }
}
