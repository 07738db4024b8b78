import JSZip from 'jszip';

const CONTAINER = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;

const escapeXml = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export function opf(metadataXml: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="id">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:opf="http://www.idpf.org/2007/opf">
    ${metadataXml}
  </metadata>
</package>`;
}

/** EPUB 2 style package: creators carry opf:role="aut". */
export function simpleOpf(title: string, authors: string[]): string {
  const creators = authors.map((a) => `<dc:creator opf:role="aut">${escapeXml(a)}</dc:creator>`).join('\n    ');
  return opf(`<dc:title>${escapeXml(title)}</dc:title>\n    ${creators}`);
}

export async function buildEpub(packageXml: string | undefined): Promise<Uint8Array> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip');
  if (packageXml !== undefined) {
    zip.file('META-INF/container.xml', CONTAINER);
    zip.file('OEBPS/content.opf', packageXml);
  }
  return zip.generateAsync({ type: 'uint8array' });
}
