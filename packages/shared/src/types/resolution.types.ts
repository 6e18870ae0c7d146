import { Coordinates } from "./uiElement.types";

export type ResolutionTier =
  | "knowledge-map"
  | "accessibility-tree"
  | "optical-text"
  | "vision"
  | "ordinal-list"
  | "ordinal-vision";

export type ResolvedTarget = {
  coordinates: Coordinates;
  tier: ResolutionTier;
  label: string;
  score?: number;
};

export type OrdinalQuery = {
  /** 1-based list position, or -1 for the last item */
  position: number;
  itemType: string;
};

export type ResolutionSuccess = {
  success: true;
  query: string;
  target: ResolvedTarget;
};

export type ResolutionFailure = {
  success: false;
  query: string;
  reason: string;
  ordinal?: OrdinalQuery;
};

export type ResolutionOutcome = ResolutionSuccess | ResolutionFailure;
