import { DEFAULT_CAPACITY_POLICY } from "../../render/estimate-capacity"
import { DEFAULT_TEMPLATE_CONFIG } from "../../config/template-config"
import { DEFAULT_TEMPLATE_CONTEXT, TemplateValue } from "../../template-value"
import { TemplateText } from "../../text/template-text"
import { captureLogger } from "../../__tests__/capture-logger"
import { createTemplateFactory, template } from "../create-template-factory"

describe("template", () => {
  it("keeps interpolated values embedded", () => {
    const name = "Ada"
    const t = template`Hello, ${name}!`

    expect(t).toBeInstanceOf(TemplateValue)
    expect(t.getValues()).toEqual(["Ada"])
    expect(t.getStrings()).toEqual(["Hello, ", "!"])
  })

  it("renders every value kind", () => {
    expect(template`a${1}b${null}`.toString()).toBe("a1bnull")
  })

  it("uses the default context", () => {
    expect(template`x`.context).toBe(DEFAULT_TEMPLATE_CONTEXT)
  })

  it("copies the literals out of the tag's frozen strings array", () => {
    const t = template`a${1}b`
    const strings = t.getStrings()

    strings[0] = "z"

    expect(t.toString()).toBe("z1b")
  })
})

describe("createTemplateFactory", () => {
  it("tags, builds and wraps templates", () => {
    const { logger } = captureLogger()
    const factory = createTemplateFactory({ logger })

    const tagged = factory.tag`Hi ${"x"}!`
    const built = factory.of([1], ["a", "b"])

    expect(tagged.toString()).toBe("Hi x!")
    expect(built.toString()).toBe("a1b")
    expect(factory.text(built)).toBeInstanceOf(TemplateText)
    expect(factory.text(built).length).toBe(3)
  })

  it("logs through a child logger tagged with the module", () => {
    const { logger, entries } = captureLogger()
    const factory = createTemplateFactory({ logger })

    factory.tag`a${1}`.toString()

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      level: "trace",
      message: "template rendering cached",
      module: "template",
    })
  })

  it("applies the configured capacity policy", () => {
    const factory = createTemplateFactory({
      config: { ...DEFAULT_TEMPLATE_CONFIG, capacity: { perValue: 2, minimum: 0 } },
      logger: captureLogger().logger,
    })

    expect(factory.of([1, 2], ["ab", "c", ""]).estimateCapacity()).toBe(7)
  })

  it("shares its context with derived templates", () => {
    const factory = createTemplateFactory({ logger: captureLogger().logger })
    const t = factory.of([1], ["a", "b"])

    expect(t.context).toBe(factory.context)
    expect(t.freeze().context).toBe(factory.context)
    expect(t.plus("c").context).toBe(factory.context)
  })

  it("defaults to the default configuration", () => {
    const factory = createTemplateFactory({ logger: captureLogger().logger })

    expect(factory.context.capacity).toEqual(DEFAULT_CAPACITY_POLICY)
  })

  it("builds its own logger when none is given", () => {
    const factory = createTemplateFactory()

    expect(factory.tag`ok`.toString()).toBe("ok")
  })
})
