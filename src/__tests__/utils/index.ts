export { TestModuleBuilder, createTestModule, type EngineTestContext } from "./test-module.builder";
export { TestDataBuilder } from "./test-data.builders";
export { ManualClock } from "./test.helpers";
