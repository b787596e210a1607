import type { ConfigDocument } from "../../ports/config-value"
import { thrown } from "../../tests/utils/thrown"
import { ResolutionError } from "../errors/stage-errors"
import { resolveField, splitFieldPath } from "../resolve"

describe("resolveField", () => {
  const document: ConfigDocument = {
    a: { b: "Hello", c: { d: 5n } },
    flags: { enabled: true, ratio: 0.25 },
    list: [1n, 2n, 3n],
  }

  it("returns the leaf at a nested path", () => {
    expect(resolveField(document, "a.b")).toBe("Hello")
    expect(resolveField(document, "a.c.d")).toBe(5n)
    expect(resolveField(document, "flags.ratio")).toBe(0.25)
  })

  it("returns composite nodes as they are", () => {
    expect(resolveField(document, "a.c")).toEqual({ d: 5n })
    expect(resolveField(document, "list")).toEqual([1n, 2n, 3n])
  })

  it("fails with the full path when a key is absent", () => {
    const err = thrown(() => resolveField(document, "a.x"))

    expect(err).toBeInstanceOf(ResolutionError)
    expect(err).toMatchObject({
      code: "missing_field",
      stage: "resolve",
      context: { field: "a.x" },
      message: "config does not contain a field matching a.x",
    })
  })

  it("reports the full path when an early segment is absent", () => {
    const err = thrown(() => resolveField(document, "nope.c.d"))

    expect(err).toMatchObject({ code: "missing_field", context: { field: "nope.c.d" } })
  })

  it("fails when traversal continues below a scalar", () => {
    const err = thrown(() => resolveField(document, "a.c.d.e"))

    expect(err).toMatchObject({ code: "missing_field", context: { field: "a.c.d.e" } })
  })

  it("does not index into arrays", () => {
    const err = thrown(() => resolveField(document, "list.0"))

    expect(err).toMatchObject({ code: "missing_field", context: { field: "list.0" } })
  })

  it("does not match inherited properties", () => {
    const err = thrown(() => resolveField(document, "a.toString"))

    expect(err).toMatchObject({ code: "missing_field", context: { field: "a.toString" } })
  })

  it.each(["", "a..b", ".a", "a."])("rejects the empty segment in %j", (field) => {
    const err = thrown(() => resolveField(document, field))

    expect(err).toMatchObject({ code: "missing_field", context: { field } })
  })

  it("is repeatable on the same document", () => {
    expect(resolveField(document, "a.c.d")).toBe(resolveField(document, "a.c.d"))
    expect(document).toEqual({
      a: { b: "Hello", c: { d: 5n } },
      flags: { enabled: true, ratio: 0.25 },
      list: [1n, 2n, 3n],
    })
  })
})

describe("splitFieldPath", () => {
  it("splits on every dot", () => {
    expect(splitFieldPath("package.metadata.embedded-config.path")).toEqual([
      "package",
      "metadata",
      "embedded-config",
      "path",
    ])
  })
})
