import { FakeDocker, expect, fakeProvider } from '~/test-utils';

describe('resources/volume', () => {
	let docker: FakeDocker;

	beforeEach(() => {
		docker = new FakeDocker();
	});

	it('creates a named volume', async () => {
		const { volume } = fakeProvider(docker);

		expect(await volume.create({ name: 'data' })).to.deep.equal({
			id: 'data',
			state: {
				name: 'data',
				driver: 'local',
				mountpoint: '/var/lib/docker/volumes/data/_data',
			},
		});
		expect(docker.volumes.get('data')?.Driver).to.equal('local');
	});

	it('uses the name picked by the daemon', async () => {
		const { volume } = fakeProvider(docker);
		const res = await volume.create({ driver: 'local' });
		expect(res.id).to.equal('1'.padStart(64, '0'));
		expect(res.state.name).to.equal(res.id);
	});

	it('reads back the same mountpoint for a volume named by the daemon', async () => {
		const { volume } = fakeProvider(docker);
		const spec = { driver: 'local' };
		const { id, state } = await volume.create(spec);

		const first = await volume.read(id, spec);
		const second = await volume.read(id, spec);

		expect(state.mountpoint).to.equal(`/var/lib/docker/volumes/${id}/_data`);
		expect(first?.state.mountpoint).to.equal(state.mountpoint);
		expect(second?.state.mountpoint).to.equal(state.mountpoint);
	});

	it('deletes idempotently', async () => {
		const { volume } = fakeProvider(docker);
		await volume.create({ name: 'data' });

		await volume.delete('data', { name: 'data' });
		expect(await volume.read('data', { name: 'data' })).to.be.null;
		expect(await volume.exists('data', { name: 'data' })).to.be.false;
		await expect(volume.delete('data', { name: 'data' })).to.be.fulfilled;
	});

	it('replaces the volume when its driver changes', () => {
		const { volume } = fakeProvider(docker);
		expect(
			volume.replaces(
				{ name: 'data', driverOpts: { type: 'tmpfs' } },
				{ name: 'data', driverOpts: { type: 'nfs' } },
			),
		).to.deep.equal(['driverOpts']);
	});
});
