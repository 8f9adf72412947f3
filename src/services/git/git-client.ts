/**
 * Git operations needed for provisioning.
 * Implementations throw GitError on failure.
 */
export interface IGitClient {
  /**
   * Set a value in the user's global git configuration.
   * @throws GitError if git rejects the write
   */
  setGlobalConfig(key: string, value: string): Promise<void>;

  /**
   * Clone `source` into `destination`. The parent of `destination` must exist.
   * @throws GitError if the clone fails or times out
   */
  clone(source: string, destination: string): Promise<void>;
}
