import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ TIME_ZONE: "utc" }),
  expectedValue: () => ({ TIME_ZONE: "utc" }),
})
