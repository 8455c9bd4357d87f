export { DocstringInjector, InjectorConfig, InjectionResult } from './DocstringInjector';
