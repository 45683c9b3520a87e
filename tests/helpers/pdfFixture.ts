export interface PdfFixtureBookmark {
  title: string;
  page: number;
}

// Builds a small uncompressed PDF: one Helvetica line per entry, top to bottom.
export function buildPdf(pages: string[][], bookmarks: PdfFixtureBookmark[] = []): Buffer {
  const objects: string[] = [];
  const add = (body: string): number => {
    objects.push(body);
    return objects.length;
  };

  const catalogId = add("");
  const pagesId = add("");
  const fontId = add("<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>");

  const pageIds = pages.map((lines) => {
    const stream = [
      "BT",
      "/F1 12 Tf",
      "72 720 Td",
      ...lines.map((line, index) => `${index === 0 ? "" : "0 -20 Td "}(${escapePdfString(line)}) Tj`),
      "ET",
    ].join("\n");
    const contentId = add(`<< /Length ${Buffer.byteLength(stream, "latin1")} >>\nstream\n${stream}\nendstream`);
    return add(
      `<< /Type /Page /Parent ${pagesId} 0 R /MediaBox [0 0 612 792] ` +
        `/Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${contentId} 0 R >>`,
    );
  });

  objects[pagesId - 1] =
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pageIds.length} >>`;

  let outlines = "";
  if (bookmarks.length > 0) {
    const outlinesId = add("");
    const firstItemId = objects.length + 1;
    const itemIds = bookmarks.map((_, index) => firstItemId + index);
    bookmarks.forEach((bookmark, index) => {
      const links = [
        index > 0 ? `/Prev ${itemIds[index - 1]} 0 R` : "",
        index < itemIds.length - 1 ? `/Next ${itemIds[index + 1]} 0 R` : "",
      ].join(" ");
      add(
        `<< /Title (${escapePdfString(bookmark.title)}) /Parent ${outlinesId} 0 R ${links} ` +
          `/Dest [${pageIds[bookmark.page - 1]} 0 R /XYZ null null null] >>`,
      );
    });
    objects[outlinesId - 1] =
      `<< /Type /Outlines /First ${itemIds[0]} 0 R /Last ${itemIds[itemIds.length - 1]} 0 R ` +
      `/Count ${itemIds.length} >>`;
    outlines = ` /Outlines ${outlinesId} 0 R`;
  }

  objects[catalogId - 1] = `<< /Type /Catalog /Pages ${pagesId} 0 R${outlines} >>`;

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, index) => {
    offsets.push(Buffer.byteLength(body, "latin1"));
    body += `${index + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(body, "latin1");
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root ${catalogId} 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(body, "latin1");
}

function escapePdfString(text: string): string {
  return text.replace(/[\\()]/g, (char) => `\\${char}`);
}
