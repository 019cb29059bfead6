export * from "./physics/aabb";
export * from "./physics/body";
export * from "./physics/block";
export * from "./player/controller";
export * from "./ports/input";
export * from "./ports/render";
export * from "./ports/timing";
export * from "./sim/ids";
export * from "./sim/hash";
export * from "./sim/tick";
export * from "./sim/loop";
export * from "./level/arena";
