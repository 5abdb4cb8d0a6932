import { config, environmentName } from "./config.js";

const PROD_NAMES = new Set(["prod", "production"]);
const LOCAL_NAMES = new Set(["local", "development", "dev"]);

/**
 * The environment the process runs in. Every property is read on access.
 */
export const Environment = {
  get name(): string {
    return environmentName();
  },
  get isProd(): boolean {
    return PROD_NAMES.has(environmentName());
  },
  get isNotProd(): boolean {
    return !this.isProd;
  },
  get isLocal(): boolean {
    return LOCAL_NAMES.has(environmentName());
  },
  get isNotLocal(): boolean {
    return !this.isLocal;
  },
  get version(): string {
    return config("app.version", "0.0.0");
  },
};

export const Application = {
  get name(): string {
    return config("app.name", "Web Application");
  },
};
