export const DEVICE_COMMANDS = Symbol('DEVICE_COMMANDS');
export const SCREENSHOT_SOURCE = Symbol('SCREENSHOT_SOURCE');
export const ACCESSIBILITY_TREE_SOURCE = Symbol('ACCESSIBILITY_TREE_SOURCE');
export const OPTICAL_TEXT_SOURCE = Symbol('OPTICAL_TEXT_SOURCE');
export const VISION_SOURCE = Symbol('VISION_SOURCE');
export const RESOLUTION_VOCABULARY = Symbol('RESOLUTION_VOCABULARY');
export const TIER_MATCHERS = Symbol('TIER_MATCHERS');
