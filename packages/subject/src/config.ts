import type { SubjectConfig, SubjectConfigOverrides } from "./types.js";

export class ConfigurationManager {
  static createDefault(): SubjectConfig {
    return {
      logging: {
        enabled: false,
        allowedIds: new Set(),
        deniedIds: new Set([
          // fires once per observer per value
          "VALUE_DELIVERED",
        ]),
      },
    };
  }

  static create(overrides: SubjectConfigOverrides = {}): SubjectConfig {
    const defaultConfig = ConfigurationManager.createDefault();
    return {
      logging: {
        ...defaultConfig.logging,
        ...overrides.logging,
        allowedIds:
          overrides.logging?.allowedIds || defaultConfig.logging.allowedIds,
        deniedIds:
          overrides.logging?.deniedIds || defaultConfig.logging.deniedIds,
      },
    };
  }
}
