import { useDashboardStore } from "@/stores/dashboard-store";
import { useFetch } from "./useFetch";

/** useFetch that also reloads after every successful dashboard mutation */
export function useResource<T>(fn: () => Promise<T>, deps: unknown[] = []) {
  const revision = useDashboardStore((s) => s.revision);
  return useFetch(fn, [revision, ...deps]);
}
