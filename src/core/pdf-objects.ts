import {
  PDFArray,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFObject,
  PDFRawStream,
  PDFRef,
  PDFString,
  decodePDFRawStream
} from 'pdf-lib';

/** Typed accessors over pdf-lib's object model; all of them resolve indirect references. */

export function lookup(dict: PDFDict, key: string): PDFObject | undefined {
  return dict.lookup(PDFName.of(key));
}

export function lookupDict(dict: PDFDict, key: string): PDFDict | undefined {
  const value = lookup(dict, key);
  if (value instanceof PDFDict) return value;
  if (value instanceof PDFRawStream) return value.dict;
  return undefined;
}

export function lookupArray(dict: PDFDict, key: string): PDFArray | undefined {
  const value = lookup(dict, key);
  return value instanceof PDFArray ? value : undefined;
}

export function lookupName(dict: PDFDict, key: string): string | undefined {
  const value = lookup(dict, key);
  return value instanceof PDFName ? value.decodeText() : undefined;
}

export function lookupNumber(dict: PDFDict, key: string): number | undefined {
  const value = lookup(dict, key);
  return value instanceof PDFNumber ? value.asNumber() : undefined;
}

export function lookupText(dict: PDFDict, key: string): string | undefined {
  const value = lookup(dict, key);
  if (value instanceof PDFString || value instanceof PDFHexString) return value.decodeText();
  if (value instanceof PDFName) return value.decodeText();
  return undefined;
}

export function arrayItems(array: PDFArray): (PDFObject | undefined)[] {
  const items: (PDFObject | undefined)[] = [];
  for (let i = 0; i < array.size(); i++) items.push(array.lookup(i));
  return items;
}

export function numberArray(array: PDFArray | undefined): number[] {
  if (!array) return [];
  return arrayItems(array).map((item) => (item instanceof PDFNumber ? item.asNumber() : 0));
}

export function streamBytes(value: PDFObject | undefined): Uint8Array | undefined {
  if (!(value instanceof PDFRawStream)) return undefined;
  return decodePDFRawStream(value).decode();
}

export function refKey(value: PDFObject | undefined): string | undefined {
  return value instanceof PDFRef ? `${value.objectNumber}R${value.generationNumber}` : undefined;
}

/** Entries of a dictionary whose values are resolved but keys kept as decoded names. */
export function dictEntries(dict: PDFDict): [string, PDFObject | undefined, PDFObject][] {
  return dict.entries().map(([key, raw]) => [key.decodeText(), dict.lookup(key), raw]);
}
