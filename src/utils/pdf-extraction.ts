type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfjs: Promise<PdfJs> | undefined;

// pdfjs-dist ships as ESM only; NodeNext keeps this a native import() in the CommonJS build
function loadPdfJs(): Promise<PdfJs> {
  pdfjs ??= import('pdfjs-dist/legacy/build/pdf.mjs');
  return pdfjs;
}

/**
 * Extracts the text layer of a PDF, one line per page
 */
export async function extractTextFromPDF(data: Uint8Array): Promise<string> {
  const { getDocument } = await loadPdfJs();
  const pdf = await getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;
  const pages: string[] = [];

  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();

      const pageText = textContent.items
        .map(item => ('str' in item ? item.str : ''))
        .join(' ');

      pages.push(pageText);
    }
  } finally {
    await pdf.destroy();
  }

  return pages.join('\n').trim();
}

/**
 * Decodes a text upload as UTF-8, falling back to Latin-1
 */
export function decodeTextFile(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer).trim();
  } catch {
    return buffer.toString('latin1').trim();
  }
}
