import BTree from "sorted-btree";
import { ArchiveSink, Artifact, StagedArtifact } from "../ArchiveSink";

export class MemoryArchiveSink extends ArchiveSink
{
    //published artifacts by path
    store: BTree<string, Uint8Array> = new BTree<string, Uint8Array>();
    //artifacts staged but not yet published
    staging: BTree<string, Uint8Array> = new BTree<string, Uint8Array>();

    read(path: string) : Promise<Uint8Array | undefined>
    {
        return Promise.resolve(this.store.get(path));
    }

    paths() : string[]
    {
        return this.store.keysArray();
    }

    stage_internal(artifact: Artifact) : Promise<StagedArtifact>
    {
        const staging = `${artifact.path}.staged`;
        this.staging.set(staging, artifact.data.slice());
        return Promise.resolve({ ...artifact, staging: staging });
    }

    async publish_internal(staged: StagedArtifact[]) : Promise<void>
    {
        for (const artifact of staged) {
            const data = this.staging.get(artifact.staging);
            if (data === undefined) throw new Error(`Artifact '${artifact.path}' was never staged`);
            this.store.set(artifact.path, data);
            this.staging.delete(artifact.staging);
        }
    }

    discard_internal(staged: StagedArtifact[]) : Promise<void>
    {
        for (const artifact of staged) this.staging.delete(artifact.staging);
        return Promise.resolve();
    }
}
