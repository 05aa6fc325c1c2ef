import { Annotation } from '@langchain/langgraph';
import type { ConversionMethod, StyleProfile } from '@tonecraft/shared';

export const FormalConversionState = Annotation.Root({
  // Input
  text: Annotation<string>,
  context: Annotation<string>,
  profile: Annotation<StyleProfile>,
  reachable: Annotation<boolean>,

  // First stage
  primaryOutput: Annotation<string>,
  method: Annotation<ConversionMethod>,

  // Second stage
  convertedText: Annotation<string>,

  // Every fallback taken along the way
  degradations: Annotation<string[]>({
    reducer: (current, update) => current.concat(update),
    default: () => [],
  }),
});

export type FormalConversionStateType = typeof FormalConversionState.State;
