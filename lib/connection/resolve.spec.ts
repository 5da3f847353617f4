import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

import { expect } from '~/test-utils';
import {
	ConfigurationError,
	ConnectionDeferred,
	IncompleteTlsConfiguration,
} from '../errors';
import { parseHost, resolve, resolveOrDefer } from './resolve';
import type { ProviderSettings } from './settings';

const BASE: ProviderSettings = {
	host: 'tcp://10.0.0.2:2376',
	machineName: 'default',
};

describe('connection/resolve', () => {
	let certPath: string;

	beforeEach(async () => {
		certPath = await fs.mkdtemp(path.join(os.tmpdir(), 'dockside-certs-'));
	});

	afterEach(async () => {
		await fs.rm(certPath, { recursive: true, force: true });
	});

	async function writeCerts(machine: string, names: string[]) {
		const dir = path.join(certPath, machine);
		await fs.mkdir(dir, { recursive: true });
		for (const name of names) {
			await fs.writeFile(path.join(dir, `${name}.pem`), `${machine}-${name}`);
		}
	}

	describe('parseHost', () => {
		it('accepts the supported schemes', () => {
			expect(parseHost('unix:///var/run/docker.sock').protocol).to.equal(
				'unix:',
			);
			expect(parseHost('tcp://10.0.0.2:2376').port).to.equal('2376');
			expect(parseHost('npipe:////./pipe/docker_engine').protocol).to.equal(
				'npipe:',
			);
			expect(parseHost('https://docker.local').hostname).to.equal(
				'docker.local',
			);
		});

		it('rejects unsupported schemes', () => {
			expect(() => parseHost('ftp://10.0.0.2')).to.throw(
				ConfigurationError,
				"unsupported scheme 'ftp:' for docker host 'ftp://10.0.0.2'",
			);
		});

		it('rejects values that are not URIs', () => {
			expect(() => parseHost('docker-host')).to.throw(
				ConfigurationError,
				"invalid docker host 'docker-host'",
			);
		});
	});

	describe('resolve', () => {
		it('returns a connection without TLS when no material is given', async () => {
			const res = await resolve(BASE);
			expect(res).to.deep.equal({
				deferred: false,
				connection: {
					host: 'tcp://10.0.0.2:2376',
					machineName: 'default',
					ping: false,
				},
			});
		});

		it('freezes the resolved connection', async () => {
			const connection = await resolveOrDefer({
				...BASE,
				caMaterial: 'ca',
				certMaterial: 'cert',
				keyMaterial: 'key',
			});
			expect(Object.isFrozen(connection)).to.be.true;
			expect(Object.isFrozen(connection.tls)).to.be.true;
		});

		it('defers when the provider has no host yet', async () => {
			expect(await resolve({ machineName: 'default' })).to.deep.equal({
				deferred: true,
				reason: 'no docker host configured',
			});
		});

		it('defers when the provider has no machine name yet', async () => {
			expect(await resolve({ host: BASE.host })).to.deep.equal({
				deferred: true,
				reason: 'no docker machine name configured',
			});
		});

		it('fails if resource overrides are given without a host', async () => {
			await expect(
				resolve({ machineName: 'default' }, { certPath }),
			).to.be.rejectedWith(
				ConfigurationError,
				'resource connection settings are missing a host',
			);
		});

		it('uses the resource host and machine name over the provider ones', async () => {
			await writeCerts('edge', ['ca', 'cert', 'key']);
			const connection = await resolveOrDefer(
				{ ...BASE, certPath },
				{ host: 'tcp://10.0.0.9:2376', machineName: 'edge' },
			);
			expect(connection.host).to.equal('tcp://10.0.0.9:2376');
			expect(connection.machineName).to.equal('edge');
			expect(connection.tls?.ca.toString()).to.equal('edge-ca');
		});

		it('validates the merged host', async () => {
			await expect(
				resolve(BASE, { host: 'ssh://10.0.0.2' }),
			).to.be.rejectedWith(ConfigurationError, "unsupported scheme 'ssh:'");
		});

		it('reads the material from the machine directory', async () => {
			await writeCerts('default', ['ca', 'cert', 'key']);
			const connection = await resolveOrDefer({ ...BASE, certPath });
			expect(connection.tls?.ca.toString()).to.equal('default-ca');
			expect(connection.tls?.cert.toString()).to.equal('default-cert');
			expect(connection.tls?.key.toString()).to.equal('default-key');
		});

		it('prefers inline material over files', async () => {
			await writeCerts('default', ['ca', 'cert', 'key']);
			const connection = await resolveOrDefer(
				{ ...BASE, certPath, caMaterial: 'provider-ca' },
				{ certMaterial: Buffer.from('resource-cert') },
			);
			expect(connection.tls?.ca.toString()).to.equal('provider-ca');
			expect(connection.tls?.cert.toString()).to.equal('resource-cert');
			expect(connection.tls?.key.toString()).to.equal('default-key');
		});

		it('prefers an explicit file over the machine directory', async () => {
			await writeCerts('default', ['ca', 'cert', 'key']);
			const keyFile = path.join(certPath, 'other-key.pem');
			await fs.writeFile(keyFile, 'other-key');

			const connection = await resolveOrDefer({ ...BASE, certPath, keyFile });
			expect(connection.tls?.key.toString()).to.equal('other-key');
		});

		it('fails if an explicit file cannot be read', async () => {
			await expect(
				resolve({
					...BASE,
					caFile: path.join(certPath, 'missing.pem'),
				}),
			).to.be.rejectedWith(
				ConfigurationError,
				'error reading CA certificate file',
			);
		});

		it('fails if the machine directory does not exist', async () => {
			await expect(
				resolve({ ...BASE, certPath, machineName: 'missing' }),
			).to.be.rejectedWith(
				ConfigurationError,
				`error reading certificate directory '${path.join(
					certPath,
					'missing',
				)}'`,
			);
		});

		it('connects without TLS if the machine directory is empty', async () => {
			await writeCerts('default', []);
			const connection = await resolveOrDefer({ ...BASE, certPath });
			expect(connection.tls).to.be.undefined;
		});

		it('reports the missing parts of an incomplete TLS setup', async () => {
			await writeCerts('default', ['ca']);
			const err = await resolve({ ...BASE, certPath }).then(
				() => null,
				(e: unknown) => e,
			);
			expect(err).to.be.instanceOf(IncompleteTlsConfiguration);
			expect(err).to.have.property('missing').that.deep.equals([
				'client certificate',
				'client key',
			]);
		});

		it('treats empty inline material as absent', async () => {
			await expect(
				resolve({ ...BASE, caMaterial: '', certMaterial: 'cert' }),
			).to.be.rejectedWith(
				IncompleteTlsConfiguration,
				'incomplete TLS configuration: missing CA certificate, client key',
			);
		});

		it('carries the ping setting of the provider', async () => {
			const connection = await resolveOrDefer({ ...BASE, ping: true });
			expect(connection.ping).to.be.true;
		});
	});

	describe('resolveOrDefer', () => {
		it('throws ConnectionDeferred when the provider is not configured', async () => {
			await expect(resolveOrDefer({})).to.be.rejectedWith(
				ConnectionDeferred,
				'connection deferred: no docker host configured',
			);
		});
	});
});
