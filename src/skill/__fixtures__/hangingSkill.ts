export function executeSkill(): Promise<never> {
  return new Promise(() => undefined);
}
