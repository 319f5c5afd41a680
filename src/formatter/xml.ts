export type Attributes = Record<string, string | number | undefined>;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Milliseconds as seconds with three decimals */
export function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function renderAttributes(attributes: Attributes): string {
  return Object.entries(attributes)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([name, value]) => ` ${name}="${escapeXml(String(value))}"`)
    .join("");
}

/**
 * Line-oriented XML builder, two spaces per nesting level
 */
export class XmlWriter {
  private lines: string[] = ['<?xml version="1.0" encoding="UTF-8"?>'];
  private stack: string[] = [];

  private push(line: string): this {
    this.lines.push(`${"  ".repeat(this.stack.length)}${line}`);
    return this;
  }

  open(name: string, attributes: Attributes = {}): this {
    this.push(`<${name}${renderAttributes(attributes)}>`);
    this.stack.push(name);
    return this;
  }

  close(): this {
    const name = this.stack.pop();
    if (name === undefined) {
      throw new Error("no open element to close");
    }
    return this.push(`</${name}>`);
  }

  empty(name: string, attributes: Attributes = {}): this {
    return this.push(`<${name}${renderAttributes(attributes)}/>`);
  }

  text(name: string, attributes: Attributes, content: string): this {
    return this.push(`<${name}${renderAttributes(attributes)}>${escapeXml(content)}</${name}>`);
  }

  toString(): string {
    if (this.stack.length > 0) {
      throw new Error(`unclosed element <${this.stack[this.stack.length - 1]}>`);
    }
    return `${this.lines.join("\n")}\n`;
  }
}
