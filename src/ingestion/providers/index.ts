export { githubAdapter } from './github.adapter';
export { gitlabAdapter } from './gitlab.adapter';
export { bitbucketAdapter } from './bitbucket.adapter';
export type { ProviderAdapter, ParseError, RepositoryIdentity } from './provider-adapter';
