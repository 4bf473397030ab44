export type PdfFragmentErrorReason = "pdf_parser_missing" | "pdf_read_failed";

export class PdfFragmentError extends Error {
    constructor(
        public readonly reason: PdfFragmentErrorReason,
        message?: string
    ) {
        super(message ?? reason);
        this.name = "PdfFragmentError";
    }
}

export class KeywordTableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "KeywordTableError";
    }
}

export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    return String(error);
}
