export const queryKeys = {
  config: ['config'] as const,
  health: ['health'] as const,
  session: (id: string) => ['session', id] as const,
};
