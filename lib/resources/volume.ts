import type { VolumeDetails } from '../client';
import { NotFound, RuntimeError } from '../errors';
import type { Observed, VolumeSpec, VolumeState } from '../types';
import type { Context } from './resource';
import { Resource } from './resource';

function toObserved(v: VolumeDetails): Observed<VolumeState> {
	return {
		id: v.Name,
		state: { name: v.Name, driver: v.Driver, mountpoint: v.Mountpoint },
	};
}

async function read(
	id: string,
	_: VolumeSpec,
	{ client }: Context,
): Promise<Observed<VolumeState> | null> {
	try {
		return toObserved(await client.inspectVolume(id));
	} catch (e) {
		if (NotFound.is(e)) {
			return null;
		}
		throw new RuntimeError(`unable to inspect volume ${id}`, e);
	}
}

/**
 * Volumes are identified by name. The daemon picks one if the
 * spec leaves it empty.
 */
export const Volume = Resource.of<VolumeSpec, VolumeState>({
	kind: 'volume',
	description: (spec) => (spec.name ? `volume '${spec.name}'` : 'volume'),
	validate: () => {
		/* every field is optional */
	},
	async create(spec, { client }) {
		try {
			const volume = await client.createVolume({
				Name: spec.name || undefined,
				Driver: spec.driver,
				DriverOpts: spec.driverOpts,
			});
			return toObserved(volume);
		} catch (e) {
			throw new RuntimeError('unable to create volume', e);
		}
	},
	read,
	async delete(id, _, { client }) {
		try {
			await client.removeVolume(id);
		} catch (e) {
			if (NotFound.is(e)) {
				return;
			}
			throw new RuntimeError(`error deleting volume ${id}`, e);
		}
	},
	async exists(id, spec, ctx) {
		return (await read(id, spec, ctx)) != null;
	},
});
