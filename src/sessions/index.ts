// ============================================================================
// SESSION MODULE EXPORTS
// ============================================================================

export { StepSequence } from "./flow.js";
export { OnboardingFlow, ONBOARDING_SEQUENCE, progressBar } from "./onboarding.js";
export type { OnboardingAction, FlowInput, OnboardingTurn } from "./onboarding.js";
export { ReflectionFlow, REFLECTION_SEQUENCE, productivityLevel } from "./reflection.js";
export type { ReflectionStart, ReflectionTurn } from "./reflection.js";
export * from "./profile.js";
