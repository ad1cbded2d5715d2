import { promises as fs } from 'fs';
import { ConfigurationError, RenderError, errorMessage } from '../../shared/errors.js';
import type { Artifact, DeviceProfile, Renderer } from '../types.js';

/**
 * Turns an Artifact into PNG bytes: page artifacts are rendered, file
 * artifacts are read from disk.
 */
export class ArtifactLoader {
    constructor(
        private readonly renderer?: Renderer,
        private readonly profile?: DeviceProfile
    ) {}

    async load(artifact: Artifact): Promise<Buffer> {
        if (artifact.kind === 'file') {
            try {
                return await fs.readFile(artifact.path);
            } catch (error) {
                throw new RenderError(artifact.path, errorMessage(error));
            }
        }

        if (!this.renderer) {
            throw new ConfigurationError(`No renderer configured to capture ${artifact.address}`);
        }
        const { image } = await this.renderer.render(artifact.address, artifact.locale, this.profile);
        return image;
    }
}
