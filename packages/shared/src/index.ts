export * from "./types/uiElement.types";
export * from "./types/resolution.types";
export * from "./types/collaborators.types";
export * from "./types/errors";
export * from "./utils/geometry.utils";
