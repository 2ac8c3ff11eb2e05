export function buildTransaction() {
  return { to: '0x00000000000000000000000000000000000000aa' };
}
