export default async function executeSkill(
  _providerUrl: string,
  _agentAddress: string,
  deployedContracts: Record<string, string>
) {
  return {
    to: deployedContracts['donation-box'],
    value: '1000',
    data: '0xd0e30db0',
  };
}
