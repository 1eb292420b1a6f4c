/**
 * Builds small PDFs with mupdf so extraction tests don't depend on fixture files.
 */
import mupdf from "mupdf";

/**
 * One page per entry; each non-empty entry is drawn as a single line of
 * Helvetica text, an empty entry leaves the page blank.
 */
export function createTextPdf(pages: string[]): Buffer {
  const doc = new mupdf.PDFDocument();
  const font = doc.addSimpleFont(new mupdf.Font("Helvetica"));

  for (const text of pages) {
    const fonts = doc.newDictionary();
    fonts.put("F1", font);
    const resources = doc.newDictionary();
    resources.put("Font", fonts);

    const content = text ? `BT /F1 12 Tf 72 720 Td (${text}) Tj ET` : "";
    doc.insertPage(-1, doc.addPage([0, 0, 612, 792], 0, doc.addObject(resources), content));
  }

  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}
