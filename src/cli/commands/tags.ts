import { getConfigManager } from '../../core/config';
import { tagToString } from '../../core/shared/pip-tags';
import { applyOptions, buildEnvironment, InstallCommandOptions } from './install';

type TagsCommandOptions = Pick<InstallCommandOptions, 'pythonVersion' | 'platform' | 'arch'>;

/**
 * 로컬 환경이 허용하는 태그를 순위 순으로 출력
 */
export function tagsCommand(options: TagsCommandOptions): void {
  const config = applyOptions(getConfigManager().getConfig(), options);
  const environment = buildEnvironment(config, options);

  environment.tags.forEach((tag, index) => {
    console.log(`${index}\t${tagToString(tag)}`);
  });
}
