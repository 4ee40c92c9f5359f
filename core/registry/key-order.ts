/**
 * Source-order member keys of a JSON document.
 *
 * `JSON.parse` builds plain objects, which list integer-like keys first
 * in ascending numeric order. A registry's `versions` object is ordered
 * by publication, and that order must survive even for a version named
 * `"2"`, so the keys are read back from the document text.
 *
 * @module core/registry/key-order
 */

const WHITESPACE = new Set([' ', '\t', '\n', '\r'])

/**
 * Keys of the object stored under top-level `member`, in the order the
 * text declares them. A repeated key keeps its first position; a repeated
 * `member` takes its last occurrence, as `JSON.parse` does.
 *
 * Expects text that `JSON.parse` has already accepted.
 *
 * @returns undefined when the document is not an object or `member` is
 *   absent or not an object
 *
 * @example
 * ```typescript
 * memberKeyOrder('{"versions":{"1.0.0":{},"2":{}}}', 'versions') // ['1.0.0', '2']
 * ```
 */
export function memberKeyOrder(text: string, member: string): string[] | undefined {
  const scanner = new KeyScanner(text)

  let found: string[] | undefined
  const topLevel = scanner.readObject((key) => {
    if (key === member && scanner.peek() === '{') {
      const keys = scanner.readObject(() => scanner.skipValue())
      found = keys
    } else {
      scanner.skipValue()
    }
  })

  return topLevel ? found : undefined
}

class KeyScanner {
  private pos = 0

  constructor(private readonly text: string) {}

  peek(): string | undefined {
    this.skipWhitespace()
    return this.text[this.pos]
  }

  /**
   * Read an object, calling `onMember` with each key once the cursor sits
   * on the member's value. `onMember` must consume the value.
   *
   * @returns the distinct keys in source order, or undefined if the
   *   cursor is not on an object
   */
  readObject(onMember: (key: string) => void): string[] | undefined {
    if (this.peek() !== '{') return undefined
    this.pos++

    const keys: string[] = []
    const seen = new Set<string>()

    while (this.peek() !== '}') {
      if (this.peek() === ',') this.pos++
      this.skipWhitespace()

      const key = this.readString()
      if (!seen.has(key)) {
        seen.add(key)
        keys.push(key)
      }

      this.skipWhitespace()
      this.expect(':')
      this.skipWhitespace()
      onMember(key)
    }

    this.pos++
    return keys
  }

  skipValue(): void {
    const first = this.peek()
    if (first === '"') {
      this.readString()
      return
    }

    if (first === '{' || first === '[') {
      let depth = 0
      while (this.pos < this.text.length) {
        const char = this.text[this.pos]
        if (char === '"') {
          this.readString()
          continue
        }
        this.pos++
        if (char === '{' || char === '[') depth++
        if (char === '}' || char === ']') {
          depth--
          if (depth === 0) return
        }
      }
      throw new SyntaxError('Unterminated JSON container')
    }

    // number, true, false or null
    while (this.pos < this.text.length) {
      const char = this.text[this.pos]
      if (char === undefined || char === ',' || char === '}' || char === ']' || WHITESPACE.has(char)) return
      this.pos++
    }
  }

  private readString(): string {
    const start = this.pos
    this.expect('"')
    while (this.pos < this.text.length) {
      const char = this.text[this.pos]
      if (char === '\\') {
        this.pos += 2
        continue
      }
      this.pos++
      if (char === '"') {
        const decoded: unknown = JSON.parse(this.text.slice(start, this.pos))
        if (typeof decoded !== 'string') break
        return decoded
      }
    }
    throw new SyntaxError(`Unterminated JSON string at ${start}`)
  }

  private expect(char: string): void {
    if (this.text[this.pos] !== char) {
      throw new SyntaxError(`Expected ${JSON.stringify(char)} at ${this.pos}`)
    }
    this.pos++
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const char = this.text[this.pos]
      if (char === undefined || !WHITESPACE.has(char)) return
      this.pos++
    }
  }
}
