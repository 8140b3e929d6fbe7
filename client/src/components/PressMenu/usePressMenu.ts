/**
 * usePressMenu Hook
 *
 * Attaches a PressMenuInteraction to an element for the lifetime of the
 * component, following the ref if it moves to another element. The builder
 * may change on every render; the interaction always calls the latest one.
 */

import { useEffect, useRef, useState, type RefObject } from 'react';
import { PressMenuInteraction, type PressMenuInteractionOptions } from './PressMenuInteraction';
import type { MenuBuilder } from './types';

export function usePressMenu(
  targetRef: RefObject<HTMLElement>,
  builder: MenuBuilder,
  options?: PressMenuInteractionOptions
): PressMenuInteraction {
  // Options are read once; a new interaction per render would drop the
  // active presentation's owner
  const [interaction] = useState(() => new PressMenuInteraction(options));
  const builderRef = useRef(builder);
  builderRef.current = builder;

  const attachedRef = useRef<HTMLElement | null>(null);

  // Runs after every commit so a ref moved to another element is followed
  useEffect(() => {
    const target = targetRef.current;
    if (target === attachedRef.current) return;

    attachedRef.current = target;
    if (target) {
      interaction.attach(target, (location) => builderRef.current(location));
    } else {
      interaction.detach();
    }
  });

  useEffect(
    () => () => {
      attachedRef.current = null;
      interaction.detach();
    },
    [interaction]
  );

  return interaction;
}
