import { useState, useCallback } from "react";

export function useToggle(initialState = false) {
  const [state, setState] = useState(initialState);
  const toggle = useCallback(() => setState(s => !s), []);
  const set = useCallback((v: boolean) => setState(v), []);
  return { state, toggle, set } as const;
}
