/**
 * Minimal DICOM Part 10 file (explicit VR little endian) holding only the given short-VR elements.
 */
export function buildDicomFile(elements: Array<{ group: number; element: number; vr: string; value: string }>): Uint8Array {
  const chunks: number[] = [];

  const push = (group: number, element: number, vr: string, value: string, pad: string) => {
    const padded = value.length % 2 === 0 ? value : value + pad;
    chunks.push(group & 0xff, group >> 8, element & 0xff, element >> 8);
    chunks.push(vr.charCodeAt(0), vr.charCodeAt(1));
    chunks.push(padded.length & 0xff, padded.length >> 8);
    for (let i = 0; i < padded.length; i++) chunks.push(padded.charCodeAt(i));
  };

  // Transfer syntax: explicit VR little endian.
  push(0x0002, 0x0010, 'UI', '1.2.840.10008.1.2.1', '\0');
  for (const e of elements) push(e.group, e.element, e.vr, e.value, ' ');

  const out = new Uint8Array(132 + chunks.length);
  out.set([0x44, 0x49, 0x43, 0x4d], 128);
  out.set(chunks, 132);
  return out;
}

export const PHANTOM_SCAN_ELEMENTS = [
  { group: 0x0008, element: 0x0022, vr: 'DA', value: '20240315' },
  { group: 0x0018, element: 0x0080, vr: 'DS', value: '2000' },
  { group: 0x0018, element: 0x0084, vr: 'DS', value: '123.2582' },
  { group: 0x0018, element: 0x1000, vr: 'LO', value: 'SN-4242' },
];
