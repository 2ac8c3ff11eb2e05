export default {
  executeSkill: (providerUrl: string) => ({ query_result: { providerUrl } }),
};
