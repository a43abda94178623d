export const EMPTY_SLOT = '_';

// Pairs print as `<first second>`.
export function formatElement(value: unknown): string {
  if (Array.isArray(value) && value.length === 2) {
    return `<${formatElement(value[0])} ${formatElement(value[1])}>`;
  }
  return String(value);
}

export function renderSlots<T>(items: readonly T[], capacity: number): string {
  const slots: string[] = [];
  for (let i = 0; i < capacity; i++) {
    slots.push(i < items.length ? formatElement(items[i]) : EMPTY_SLOT);
  }
  return slots.join(' ');
}
