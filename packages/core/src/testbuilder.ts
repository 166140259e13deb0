import { Logger, SilentLogger, TestbuilderConfig } from '@testbuilder/shared';
import { ProcessRunner } from '@testbuilder/exec';
import { BuildService } from './build/service';
import { CleanupReport, cleanModel } from './cleanup/cleaner';
import { GenerationReport, TrailGenerationEngine } from './generate/engine';
import { BuildManifest, ManifestStore } from './manifest/store';
import { assertReady } from './readiness/validator';
import { ArtifactSynchronizer, SyncReport } from './sync/synchronizer';

export interface TestbuilderOptions {
  config: TestbuilderConfig;
  runner: ProcessRunner;
  /** Directory holding the models and receiving generated files */
  workDir: string;
  logger?: Logger;
}

/**
 * Entry points of the pipeline, one per command-line verb. Each call is
 * independent and runs to completion before returning.
 */
export class Testbuilder {
  private readonly logger: Logger;
  private readonly manifest: ManifestStore;

  constructor(private readonly options: TestbuilderOptions) {
    this.logger = options.logger ?? new SilentLogger();
    this.manifest = new ManifestStore(options.config.manifest, this.logger);
  }

  /**
   * Validates the model's inputs, then runs the checker and the generator.
   * Nothing is spawned when an input is missing.
   */
  async generate(model: string): Promise<GenerationReport> {
    const { config, runner, workDir } = this.options;
    await assertReady(workDir, model);
    const engine = new TrailGenerationEngine({
      runner,
      checker: config.checker,
      generator: config.generator,
      generatorArgs: config.generatorArgs,
      policy: { strictExitCodes: config.strictExitCodes },
      logger: this.logger,
    });
    return engine.generate(workDir, model);
  }

  copy(model: string): Promise<SyncReport> {
    const { config, workDir } = this.options;
    return new ArtifactSynchronizer(this.manifest, this.logger).sync(workDir, model, {
      targetDir: config.testSourceDir,
      targetRoot: config.targetRoot,
    });
  }

  clean(model: string): Promise<CleanupReport> {
    return cleanModel(this.options.workDir, model, this.logger);
  }

  zero(): Promise<BuildManifest> {
    return this.manifest.reset(this.options.config.baselineSource);
  }

  compile(): Promise<void> {
    return this.build().compile();
  }

  run(): Promise<number> {
    return this.build().runTests();
  }

  private build(): BuildService {
    return new BuildService(this.options.runner, this.options.config, this.logger);
  }
}
