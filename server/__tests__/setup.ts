/**
 * Global test setup. Nest decorators need the metadata polyfill loaded first.
 */
import "reflect-metadata";
