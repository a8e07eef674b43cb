// feed 正文预处理：在交给 XML 解析器之前清掉非法字符、DOCTYPE 与数字字符引用


const REPLACEMENT_CHAR = 0xfffd;

/** DOCTYPE 声明（含内部子集 [...]） */
const DOCTYPE = /<!DOCTYPE[^>[]*(\[[\s\S]*?\])?\s*>/gi;

/** CDATA 段原样保留，其余位置的数字字符引用 */
const NUMERIC_REF_OUTSIDE_CDATA = /<!\[CDATA\[[\s\S]*?\]\]>|&#(?:x([0-9a-fA-F]{1,6})|([0-9]{1,7}));/g;

/** 解码后会破坏 XML 结构的字符，改写为预定义实体交给解析器处理 */
const PREDEFINED: Record<string, string> = {
  "<": "&lt;",
  ">": "&gt;",
  "&": "&amp;",
  "\"": "&quot;",
  "'": "&apos;",
};


/** XML 1.0 允许出现的码点：TAB/LF/CR 之外的控制字符、孤立代理项与 U+FFFE/U+FFFF 均不允许 */
function isAllowedCodePoint(cp: number): boolean {
  if (cp === 0x09 || cp === 0x0a || cp === 0x0d) return true;
  if (cp < 0x20 || cp === 0x7f) return false;
  if (cp >= 0xd800 && cp <= 0xdfff) return false;
  if (cp === 0xfffe || cp === 0xffff) return false;
  return cp <= 0x10ffff;
}


/**
 * 清洗 feed 正文：字节按 UTF-8 解码（非法序列先替换为 U+FFFD 再丢弃），
 * 去掉不允许的控制字符、孤立代理项与非字符。
 */
export function sanitizeXml(body: string | Uint8Array): string {
  const text = typeof body === "string" ? body : new TextDecoder("utf-8").decode(body);
  let out = "";
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? REPLACEMENT_CHAR;
    if (cp === REPLACEMENT_CHAR || !isAllowedCodePoint(cp)) continue;
    out += ch;
  }
  return out;
}


/** 去掉 DOCTYPE 声明，自定义实体因此无从定义或展开 */
export function stripDoctype(xml: string): string {
  return xml.replace(DOCTYPE, "");
}


/** 数字字符引用在解析前展开；非法码点整段丢弃，结构字符改写为预定义实体；CDATA 内不动 */
export function decodeNumericReferences(xml: string): string {
  return xml.replace(NUMERIC_REF_OUTSIDE_CDATA, (m: string, hex: string | undefined, dec: string | undefined) => {
    if (hex == null && dec == null) return m;
    const cp = hex != null ? parseInt(hex, 16) : Number(dec);
    if (!Number.isFinite(cp) || !isAllowedCodePoint(cp)) return "";
    const ch = String.fromCodePoint(cp);
    return PREDEFINED[ch] ?? ch;
  });
}


/** 解析前的完整预处理流水线 */
export function prepareFeedBody(body: string | Uint8Array): string {
  return decodeNumericReferences(stripDoctype(sanitizeXml(body)));
}
