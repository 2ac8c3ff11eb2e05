export async function executeSkill(
  _providerUrl: string,
  _agentAddress: string,
  deployedContracts: Record<string, string>
) {
  return {
    to: deployedContracts['donation-box'],
    value: 25n * 10n ** 16n,
    data: '0x',
  };
}
