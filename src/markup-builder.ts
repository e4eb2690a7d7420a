/**
 * MarkupBuilder - string builder for indented XML.
 */

export type Attributes = Record<string, string | number>;

export class MarkupBuilder {
  private parts: string[] = [];
  private indentLevel: number = 0;
  private indentStr: string;

  constructor(indentStr: string = "  ") {
    this.indentStr = indentStr;
  }

  /**
   * Add one line at the current indentation.
   */
  writeLine(content: string): this {
    this.parts.push(this.indentStr.repeat(this.indentLevel), content, "\n");
    return this;
  }

  /** `<name attrs>` on its own line, indenting what follows. */
  open(name: string, attrs: Attributes = {}): this {
    this.writeLine(`<${name}${formatAttributes(attrs)}>`);
    this.indentLevel++;
    return this;
  }

  /** `</name>` at the enclosing indentation. */
  close(name: string): this {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
    return this.writeLine(`</${name}>`);
  }

  /** `<name attrs/>` */
  empty(name: string, attrs: Attributes = {}): this {
    return this.writeLine(`<${name}${formatAttributes(attrs)}/>`);
  }

  /** `<name attrs>text</name>` with the text escaped. */
  text(name: string, attrs: Attributes, content: string): this {
    return this.writeLine(`<${name}${formatAttributes(attrs)}>${escapeXml(content)}</${name}>`);
  }

  /**
   * Build the final string.
   */
  build(): string {
    return this.parts.join("");
  }
}

function formatAttributes(attrs: Attributes): string {
  return Object.entries(attrs)
    .map(([key, value]) => ` ${key}="${escapeXml(String(value))}"`)
    .join("");
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
