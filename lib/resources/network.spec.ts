import { spy } from 'sinon';

import { FakeDocker, expect, fakeProvider } from '~/test-utils';
import { ConfigurationError } from '../errors';
import { toNetworkRequest } from './network';

describe('resources/network', () => {
	let docker: FakeDocker;

	beforeEach(() => {
		docker = new FakeDocker();
	});

	describe('toNetworkRequest', () => {
		it('leaves out IPAM settings unless given', () => {
			expect(toNetworkRequest({ name: 'backend' })).to.not.have.property(
				'IPAM',
			);
		});

		it('sends each IPAM block once', () => {
			const req = toNetworkRequest({
				name: 'backend',
				ipamConfig: [
					{ subnet: '10.0.0.0/24', auxAddress: { a: '10.0.0.2', b: '10.0.0.3' } },
					{ subnet: '10.0.0.0/24', auxAddress: { b: '10.0.0.3', a: '10.0.0.2' } },
				],
			});
			expect(req.IPAM).to.deep.equal({
				Driver: undefined,
				Config: [
					{
						Subnet: '10.0.0.0/24',
						IPRange: undefined,
						Gateway: undefined,
						AuxiliaryAddresses: { a: '10.0.0.2', b: '10.0.0.3' },
					},
				],
			});
		});

		it('sends a driver without config blocks', () => {
			expect(
				toNetworkRequest({ name: 'backend', ipamDriver: 'dhcp' }).IPAM,
			).to.deep.equal({ Driver: 'dhcp', Config: [] });
		});
	});

	it('requires a name', async () => {
		const create = spy(docker, 'createNetwork');
		const { network } = fakeProvider(docker);

		await expect(network.create({ name: '' })).to.be.rejectedWith(
			ConfigurationError,
			'network name cannot be empty',
		);
		expect(create).to.not.have.been.called;
	});

	it('reports the requested internal flag and options on create', async () => {
		const { network } = fakeProvider(docker);

		const res = await network.create({
			name: 'backend',
			internal: true,
			options: { 'com.docker.network.bridge.name': 'br-backend' },
		});

		expect(res).to.deep.equal({
			id: '1'.padStart(64, '0'),
			state: {
				name: 'backend',
				scope: 'local',
				driver: 'bridge',
				options: { 'com.docker.network.bridge.name': 'br-backend' },
				internal: true,
			},
		});
	});

	it('reads the network as the daemon reports it', async () => {
		const { network } = fakeProvider(docker);
		const { id } = await network.create({ name: 'backend', internal: true });

		expect(await network.read(id, { name: 'backend' })).to.deep.equal({
			id,
			state: {
				name: 'backend',
				scope: 'local',
				driver: 'bridge',
				options: {},
				internal: false,
			},
		});
	});

	it('deletes idempotently', async () => {
		const { network } = fakeProvider(docker);
		const spec = { name: 'backend' };
		const { id } = await network.create(spec);

		await network.delete(id, spec);
		expect(await network.exists(id, spec)).to.be.false;
		expect(await network.read(id, spec)).to.be.null;
		await expect(network.delete(id, spec)).to.be.fulfilled;
	});

	it('compares IPAM blocks as a set', () => {
		const { network } = fakeProvider(docker);
		const a = { subnet: '10.0.0.0/24' };
		const b = { subnet: '10.0.1.0/24', gateway: '10.0.1.1' };

		expect(
			network.replaces(
				{ name: 'backend', ipamConfig: [a, b] },
				{ name: 'backend', ipamConfig: [b, a] },
			),
		).to.deep.equal([]);
		expect(
			network.replaces(
				{ name: 'backend', ipamConfig: [a] },
				{ name: 'backend', ipamConfig: [a], driver: 'overlay' },
			),
		).to.deep.equal(['driver']);
	});
});
