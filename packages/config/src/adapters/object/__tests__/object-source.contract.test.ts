import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ WEFT_LOG_LEVEL: "debug", WEFT_CAPACITY_PER_VALUE: 4 }),
  expectedValue: () => ({ WEFT_LOG_LEVEL: "debug", WEFT_CAPACITY_PER_VALUE: 4 }),
})
