/**
 * Push payload schemas per provider. Only the fields the pipeline reads are declared.
 */
export * from './github-push.dto';
export * from './gitlab-push.dto';
export * from './bitbucket-push.dto';
