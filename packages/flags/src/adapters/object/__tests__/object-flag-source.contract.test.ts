import { describeFlagSourceContract } from "../../../ports/__tests__/flag-source.contract"
import { ObjectFlagSource } from "../object-flag-source"

describeFlagSourceContract({
  name: "ObjectFlagSource",
  make: async () => new ObjectFlagSource({ "zap-level": 4, "zap-devel": true }),
  setup: async () => {},
  expectedValue: () => ({ "zap-level": 4, "zap-devel": true }),
})
