import type { FrameworkRenderer } from "./base";
import { BootstrapFramework } from "./bootstrap";
import { BulmaFramework } from "./bulma";
import { ConfigurationError, UnknownFrameworkError } from "../services/serviceError";

export type {
  ButtonOptions,
  ButtonVariant,
  FrameworkRenderer,
  LayoutPart,
  PaginationLink,
  RenderableField,
  TablePart,
  WidgetKind
} from "./base";
export { BaseFramework } from "./base";
export { BootstrapFramework } from "./bootstrap";
export { BulmaFramework } from "./bulma";

const registry = new Map<string, FrameworkRenderer>();
let sealed = false;

const normalizeName = (name: string) => name.trim().toLowerCase();

export const registerFramework = (name: string, renderer: FrameworkRenderer) => {
  if (sealed) {
    throw new ConfigurationError(`Cannot register framework "${name}" after startup.`);
  }
  const key = normalizeName(name);
  if (!key) {
    throw new ConfigurationError("Framework name is required.");
  }
  registry.set(key, renderer);
};

export const sealFrameworks = () => {
  sealed = true;
};

export const isFrameworkRegistrySealed = () => sealed;

export const getFramework = (name: string): FrameworkRenderer => {
  const renderer = registry.get(normalizeName(name));
  if (!renderer) {
    throw new UnknownFrameworkError(name);
  }
  return renderer;
};

export const frameworkNames = () => Array.from(registry.keys()).sort();

const bootstrap = new BootstrapFramework();
registerFramework("bootstrap", bootstrap);
registerFramework("bootstrap5", bootstrap);
registerFramework("bulma", new BulmaFramework());
