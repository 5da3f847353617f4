import { spy } from 'sinon';

import { FakeDocker, expect, fakeProvider } from '~/test-utils';
import { ConfigurationError, ImageNotFound, RuntimeError } from '../errors';
import { imageRef, repositoryOf } from './image';

const FIRST_ID = `sha256:${'1'.padStart(64, '0')}`;

describe('resources/image', () => {
	let docker: FakeDocker;

	beforeEach(() => {
		docker = new FakeDocker();
	});

	it('builds the image reference from the registry, name and tag', () => {
		expect(imageRef({ name: 'nginx' })).to.equal('nginx:latest');
		expect(imageRef({ name: 'nginx', tag: '' })).to.equal('nginx');
		expect(
			imageRef({ registry: 'registry.local:5000', name: 'app', tag: 'v1' }),
		).to.equal('registry.local:5000/app:v1');
		expect(repositoryOf({ registry: 'registry.local', name: 'app' })).to.equal(
			'registry.local/app',
		);
	});

	describe('validation', () => {
		it('accepts at most one acquisition mode', async () => {
			const pull = spy(docker, 'pullImage');
			const build = spy(docker, 'buildImage');
			const { image } = fakeProvider(docker);

			await expect(
				image.create({ name: 'app', pull: true, buildLocalPath: '/src/app' }),
			).to.be.rejectedWith(
				ConfigurationError,
				"only one of pull, buildLocalPath can be set for image 'app'",
			);
			expect(pull).to.not.have.been.called;
			expect(build).to.not.have.been.called;
		});

		it('rejects negative timeouts', () => {
			const { image } = fakeProvider(docker);
			expect(() => image.validate({ name: 'app', timeout: -1 })).to.throw(
				ConfigurationError,
				'image timeout cannot be negative',
			);
		});
	});

	describe('create', () => {
		it('pulls the image and reports its state', async () => {
			const pull = spy(docker, 'pullImage');
			const { image } = fakeProvider(docker);

			const res = await image.create({ name: 'nginx', pull: true, timeout: 30 });

			expect(pull).to.have.been.calledOnceWith({
				repository: 'nginx',
				tag: 'latest',
				auth: undefined,
				timeoutMs: 30000,
			});
			expect(res).to.deep.equal({
				id: 'nginx:latest',
				state: {
					imageId: FIRST_ID,
					parent: '',
					comment: '',
					author: 'tester',
					dockerVersion: '24.0.7',
					os: 'linux',
					architecture: 'amd64',
					size: 1024,
					virtualSize: 2048,
					createdAt: 1704164645,
					labels: {},
					digests: [],
					allTags: ['nginx:latest'],
				},
			});
		});

		it('uses an image already on the daemon if no mode is set', async () => {
			docker.addImage(['redis:7']);
			const { image } = fakeProvider(docker);

			const res = await image.create({ name: 'redis', tag: '7' });
			expect(res.id).to.equal('redis:7');
			expect(res.state.imageId).to.equal(FIRST_ID);
		});

		it('fails if the image is not on the daemon and no mode is set', async () => {
			const { image } = fakeProvider(docker);
			await expect(image.create({ name: 'app' })).to.be.rejectedWith(
				ImageNotFound,
				'unable to find image app:latest',
			);
		});

		it('builds and pushes with the registry credentials', async () => {
			const build = spy(docker, 'buildImage');
			const { image } = fakeProvider(docker);

			const res = await image.create({
				registry: 'registry.local',
				name: 'app',
				tag: 'v1',
				buildLocalPath: '/src/app',
				buildArgs: { VERSION: '1', ARCH: 'amd64' },
				push: true,
				auth: [
					{ registry: 'registry.local', username: 'ci', password: 'test-secret' },
				],
			});

			expect(res.id).to.equal('registry.local/app:v1');
			expect(build).to.have.been.calledOnce;
			const req = build.firstCall.args[0];
			expect(req.name).to.equal('registry.local/app:v1');
			expect(req.contextDir).to.equal('/src/app');
			expect(req.remote).to.be.undefined;
			expect(req.buildArgs).to.deep.equal([
				{ name: 'ARCH', value: 'amd64' },
				{ name: 'VERSION', value: '1' },
			]);

			expect(docker.pushes).to.deep.equal([
				{
					name: 'registry.local/app',
					tag: 'v1',
					auth: {
						username: 'ci',
						password: 'test-secret',
						serveraddress: 'registry.local',
					},
					timeoutMs: undefined,
				},
			]);
		});

		it('wraps acquisition failures', async () => {
			docker.pullImage = async () => {
				throw new Error('manifest unknown');
			};
			const { image } = fakeProvider(docker);

			await expect(
				image.create({ name: 'nginx', tag: 'missing', pull: true }),
			).to.be.rejectedWith(
				RuntimeError,
				'failed to acquire image nginx:missing: manifest unknown',
			);
		});
	});

	describe('read', () => {
		it('passes on daemon errors other than a missing image', async () => {
			docker.inspectImage = async () => {
				throw new Error('daemon unavailable');
			};
			const { image } = fakeProvider(docker);
			const spec = { name: 'nginx' };

			await expect(image.read(FIRST_ID, spec)).to.be.rejectedWith(
				Error,
				'daemon unavailable',
			);
			await expect(image.exists(FIRST_ID, spec)).to.be.rejectedWith(
				Error,
				'daemon unavailable',
			);
		});
	});

	describe('update', () => {
		it('pushes when push is turned on', async () => {
			docker.addImage(['app:latest']);
			const { image } = fakeProvider(docker);

			await image.update('app:latest', { name: 'app' }, { name: 'app' });
			expect(docker.pushes).to.have.length(0);

			const res = await image.update(
				'app:latest',
				{ name: 'app' },
				{ name: 'app', push: true },
			);
			expect(res?.id).to.equal('app:latest');
			expect(docker.pushes).to.deep.equal([
				{
					name: 'app',
					tag: 'latest',
					auth: undefined,
					timeoutMs: undefined,
				},
			]);

			await image.update(
				'app:latest',
				{ name: 'app', push: true },
				{ name: 'app', push: true },
			);
			expect(docker.pushes).to.have.length(1);
		});

		it('changes push, keep, timeout and auth in place', () => {
			const { image } = fakeProvider(docker);
			expect(
				image.replaces(
					{ name: 'app' },
					{
						name: 'app',
						push: true,
						keep: true,
						timeout: 60,
						auth: [{ registry: '', username: 'ci', password: 'test-secret' }],
					},
				),
			).to.deep.equal([]);
			expect(
				image.replaces({ name: 'app', tag: 'v1' }, { name: 'app', tag: 'v2' }),
			).to.deep.equal(['tag']);
		});
	});

	describe('delete', () => {
		it('removes the image and ignores a missing one', async () => {
			docker.addImage(['app:latest']);
			const { image } = fakeProvider(docker);

			await image.delete('app:latest', { name: 'app' });
			expect(docker.images.size).to.equal(0);
			expect(await image.exists('app:latest', { name: 'app' })).to.be.false;

			await expect(image.delete('app:latest', { name: 'app' })).to.be.fulfilled;
		});

		it('leaves kept images on the daemon', async () => {
			docker.addImage(['app:latest']);
			const { image } = fakeProvider(docker);

			await image.delete('app:latest', { name: 'app', keep: true });
			expect(docker.images.size).to.equal(1);
			expect(await image.exists('app:latest', { name: 'app' })).to.be.true;
		});
	});
});
