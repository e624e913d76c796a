export const GIT_PROVIDERS = ['github', 'gitlab', 'bitbucket'] as const;

export type GitProvider = (typeof GIT_PROVIDERS)[number];
