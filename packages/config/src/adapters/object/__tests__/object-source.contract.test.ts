import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ NAMESPACE: "users:" }),
  expectedValue: () => ({ NAMESPACE: "users:" }),
})

describe("ObjectSource naming", () => {
  it("defaults to object:overrides", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
  })

  it("uses the given label", () => {
    expect(new ObjectSource({}, "defaults").name).toBe("object:defaults")
  })
})
