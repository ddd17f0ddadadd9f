/**
 * Built-in Format Generators
 */

export { UUIDGenerator } from './uuid-generator.js';
export { EmailGenerator } from './email-generator.js';
export { DateGenerator } from './date-generator.js';
export { DateTimeGenerator } from './datetime-generator.js';
export { UriGenerator, IPv4Generator } from './uri-generator.js';

import { UUIDGenerator } from './uuid-generator.js';
import { EmailGenerator } from './email-generator.js';
import { DateGenerator } from './date-generator.js';
import { DateTimeGenerator } from './datetime-generator.js';
import { UriGenerator, IPv4Generator } from './uri-generator.js';
import { FormatRegistry } from '../../registry/format-registry.js';

export function registerBuiltInFormats(registry: FormatRegistry): void {
  registry.register(new UUIDGenerator());
  registry.register(new EmailGenerator());
  registry.register(new DateGenerator());
  registry.register(new DateTimeGenerator());
  registry.register(new UriGenerator());
  registry.register(new IPv4Generator());
}

export function createFormatRegistry(): FormatRegistry {
  const registry = new FormatRegistry();
  registry.setInitializer(() => registerBuiltInFormats(registry));
  return registry;
}
