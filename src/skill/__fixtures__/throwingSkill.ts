export function executeSkill(): never {
  throw new TypeError('cannot read agent balance');
}
