export interface Debounced<Args extends unknown[]> {
  (...args: Args): void;
  /** Drops the pending call, if any */
  cancel(): void;
}

export default function debounce<Args extends unknown[]>(func: (...args: Args) => void, wait: number): Debounced<Args> {
  let timeout: ReturnType<typeof setTimeout> | null = null;

  const debounced = (...args: Args) => {
    if (timeout) {
      clearTimeout(timeout);
    }
    timeout = setTimeout(() => {
      timeout = null;
      func(...args);
    }, wait);
  };

  return Object.assign(debounced, {
    cancel() {
      if (timeout) {
        clearTimeout(timeout);
        timeout = null;
      }
    },
  });
}
