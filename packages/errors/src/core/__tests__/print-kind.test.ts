import { printKind } from "../print-kind"
import { renderError } from "../render"
import { TypedError } from "../typed-error"

enum NumericKind {
  Io,
  Parse,
}

enum NamedKind {
  Io = "Io",
  Parse = "Parse",
}

describe("printKind", () => {
  it("prints strings verbatim", () => {
    expect(printKind("Io")).toBe("Io")
    expect(printKind("")).toBe("")
  })

  it("prints primitives via String", () => {
    expect(printKind(404)).toBe("404")
    expect(printKind(10n)).toBe("10")
    expect(printKind(false)).toBe("false")
  })

  it("prints a numeric enum member as its value, a string enum member as its name", () => {
    const numeric = new TypedError(NumericKind.Io, {
      location: { file: "x.ts", line: 10 },
      description: "file missing",
    })
    const named = new TypedError(NamedKind.Io, {
      location: { file: "x.ts", line: 10 },
      description: "file missing",
    })

    expect(printKind(NumericKind.Parse)).toBe("1")
    expect(renderError(numeric)).toBe("0: file missing (at x.ts:10)")
    expect(renderError(named)).toBe("Io: file missing (at x.ts:10)")
  })

  it("prints symbols with their description", () => {
    expect(printKind(Symbol("Timeout"))).toBe("Symbol(Timeout)")
  })

  it("uses a custom toString", () => {
    class HttpStatus {
      constructor(readonly code: number) {}

      toString(): string {
        return `Http${this.code}`
      }
    }

    expect(printKind(new HttpStatus(503))).toBe("Http503")
  })

  it("inspects plain objects on one line", () => {
    expect(printKind({ code: "E42", retry: { after: 5 } })).toBe(
      "{ code: 'E42', retry: { after: 5 } }",
    )
  })

  it("inspects arrays", () => {
    expect(printKind(["Io", 2])).toBe("[ 'Io', 2 ]")
  })
})
