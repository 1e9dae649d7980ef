/**
 * handlekit: Typed, downcast-checked wrappers over handle-based native
 * object systems.
 *
 * Re-exports the public API of every handlekit package.
 *
 * @packageDocumentation
 */

export * from "@handlekit/core";
export * from "@handlekit/native";
export * from "@handlekit/element";
