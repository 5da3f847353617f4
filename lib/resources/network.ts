import type {
	IpamConfigRequest,
	NetworkCreateRequest,
	NetworkDetails,
} from '../client';
import { ConfigurationError, NotFound, RuntimeError } from '../errors';
import { hashIpamConfig } from '../hash';
import type { IpamConfig, NetworkSpec, NetworkState, Observed } from '../types';
import { HashSet, sameElements } from '../utils/hash-set';
import type { Context } from './resource';
import { Resource } from './resource';

function toIpamConfig(c: IpamConfig): IpamConfigRequest {
	return {
		Subnet: c.subnet,
		IPRange: c.ipRange,
		Gateway: c.gateway,
		AuxiliaryAddresses: c.auxAddress,
	};
}

/**
 * Build the network create request. IPAM settings are only sent if
 * a driver or a config block is given.
 */
export function toNetworkRequest(spec: NetworkSpec): NetworkCreateRequest {
	const configs = HashSet.of<IpamConfig>(hashIpamConfig, spec.ipamConfig);
	const withIpam = spec.ipamDriver != null || configs.size > 0;
	return {
		Name: spec.name,
		CheckDuplicate: spec.checkDuplicate,
		Driver: spec.driver,
		Internal: spec.internal,
		Options: spec.options,
		...(withIpam && {
			IPAM: {
				Driver: spec.ipamDriver,
				Config: configs.values().map(toIpamConfig),
			},
		}),
	};
}

function toState(n: NetworkDetails): NetworkState {
	return {
		name: n.Name,
		scope: n.Scope,
		driver: n.Driver,
		options: n.Options,
		internal: n.Internal,
	};
}

async function read(
	id: string,
	_: NetworkSpec,
	{ client }: Context,
): Promise<Observed<NetworkState> | null> {
	try {
		return { id, state: toState(await client.inspectNetwork(id)) };
	} catch (e) {
		if (NotFound.is(e)) {
			return null;
		}
		throw new RuntimeError(`unable to inspect network ${id}`, e);
	}
}

export const Network = Resource.of<NetworkSpec, NetworkState>({
	kind: 'network',
	description: (spec) => `network '${spec.name}'`,
	validate(spec) {
		if (!spec.name) {
			throw new ConfigurationError('network name cannot be empty');
		}
	},
	compare: {
		ipamConfig: (a, b) =>
			sameElements(hashIpamConfig, a.ipamConfig, b.ipamConfig),
	},
	async create(spec, { client }) {
		const request = toNetworkRequest(spec);
		let network: NetworkDetails;
		try {
			network = await client.createNetwork(request);
		} catch (e) {
			throw new RuntimeError(`unable to create network '${spec.name}'`, e);
		}

		// The daemon does not always echo these back on create
		const state = toState(network);
		return {
			id: network.Id,
			state: {
				...state,
				options: spec.options ?? state.options,
				internal: spec.internal ?? false,
			},
		};
	},
	read,
	async delete(id, _, { client }) {
		try {
			await client.removeNetwork(id);
		} catch (e) {
			if (NotFound.is(e)) {
				return;
			}
			throw new RuntimeError(`error deleting network ${id}`, e);
		}
	},
	async exists(id, spec, ctx) {
		return (await read(id, spec, ctx)) != null;
	},
});
