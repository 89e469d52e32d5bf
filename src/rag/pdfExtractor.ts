import { PDFLoader } from "@langchain/community/document_loaders/fs/pdf";
import type { PageText, UploadedFile } from "../types/ragTypes";

export interface PageExtractor {
  /** One entry per physical page, in page order. Throws on unreadable input. */
  extractPages(file: UploadedFile): Promise<PageText[]>;
}

export class PdfPageExtractor implements PageExtractor {
  async extractPages(file: UploadedFile): Promise<PageText[]> {
    const loader = new PDFLoader(new Blob([file.data]), { splitPages: true });
    const docs = await loader.load();

    return docs.map((doc, index) => {
      const pageNumber = Number(doc.metadata?.loc?.pageNumber);
      return {
        page: Number.isFinite(pageNumber) ? pageNumber : index + 1,
        text: doc.pageContent ?? "",
      };
    });
  }
}
