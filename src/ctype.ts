// ASCII character classes of single bytes, as in the "C" locale. Bytes >= 0x80 belong to no class.

export type BytePredicate = (byte: number) => boolean;

export const isAscii: BytePredicate = (b) => b >= 0 && b <= 0x7f;
export const isUpper: BytePredicate = (b) => b >= 0x41 && b <= 0x5a;
export const isLower: BytePredicate = (b) => b >= 0x61 && b <= 0x7a;
export const isAlpha: BytePredicate = (b) => isUpper(b) || isLower(b);
export const isDigit: BytePredicate = (b) => b >= 0x30 && b <= 0x39;
export const isAlnum: BytePredicate = (b) => isAlpha(b) || isDigit(b);
export const isXdigit: BytePredicate = (b) => isDigit(b) || (b >= 0x41 && b <= 0x46) || (b >= 0x61 && b <= 0x66);
export const isBlank: BytePredicate = (b) => b === 0x20 || b === 0x09;
export const isSpace: BytePredicate = (b) => b === 0x20 || (b >= 0x09 && b <= 0x0d);
export const isCntrl: BytePredicate = (b) => (b >= 0 && b <= 0x1f) || b === 0x7f;
export const isPrint: BytePredicate = (b) => b >= 0x20 && b <= 0x7e;
export const isGraph: BytePredicate = (b) => b >= 0x21 && b <= 0x7e;
export const isPunct: BytePredicate = (b) => isGraph(b) && !isAlnum(b);
