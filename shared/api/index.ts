// ESM + NodeNext with verbatimModuleSyntax: include .js in re-exports
export * from "./restaurants.types.js";
export * from "./restaurants.client.js";
export * from "./restaurants.format.js";
