import {test} from "node:test";
import assert from "node:assert/strict";
import {
    AddressPoolExhaustedException,
    AlreadyExistsException,
    HostNameUnresolvedException,
    IpAddressConflictException,
    MalformedIpAddressException,
    TopologyModel
} from "../src/Model/TopologyModel.ts";

test("assigns a contiguous block after the network address", () => {
    let model = new TopologyModel();
    model.createNodes(3);
    model.assignAddresses("10.1.1.0", 24);

    assert.deepEqual(model.hostnames, ["node0", "node1", "node2"]);
    assert.deepEqual(model.addresses, ["10.1.1.1", "10.1.1.2", "10.1.1.3"]);
    assert.equal(model.network, "10.1.1.0/24");
    assert.equal(model.addressOf(2), "10.1.1.3");
    assert.equal(model.getNodeByIP("10.1.1.2")?.hostname, "node1");
});

test("crosses octet boundaries inside wider networks", () => {
    let model = new TopologyModel();
    model.createNodes(300);
    model.assignAddresses("10.2.0.0", 16);

    assert.equal(model.addressOf(254), "10.2.0.255");
    assert.equal(model.addressOf(255), "10.2.1.0");
    assert.equal(model.addressOf(299), "10.2.1.44");
});

test("rejects a network address that is not aligned to its prefix", () => {
    let model = new TopologyModel();
    model.createNodes(2);
    assert.throws(() => model.assignAddresses("10.1.1.5", 24), MalformedIpAddressException);
    assert.throws(() => model.assignAddresses("10.1.1", 24), MalformedIpAddressException);
    assert.throws(() => model.assignAddresses("10.1.1.0", 31), MalformedIpAddressException);
});

test("rejects more nodes than the block has hosts", () => {
    let model = new TopologyModel();
    model.createNodes(7);
    assert.throws(() => model.assignAddresses("192.168.0.0", 29), AddressPoolExhaustedException);
});

test("host names are unique", () => {
    let model = new TopologyModel();
    model.addNode("a");
    assert.throws(() => model.addNode("a"), AlreadyExistsException);
});

test("manual addresses must be inside the network and unused", () => {
    let model = new TopologyModel();
    model.createNodes(2);
    model.assignAddresses("10.1.1.0", 24);

    assert.throws(() => model.setAddress("node0", "10.1.1.2"), IpAddressConflictException);
    assert.throws(() => model.setAddress("node0", "10.9.9.9"), MalformedIpAddressException);
    assert.throws(() => model.setAddress("nodeX", "10.1.1.9"), HostNameUnresolvedException);

    model.setAddress("node0", "10.1.1.50");
    assert.equal(model.addressOf(0), "10.1.1.50");
});

test("unaddressed nodes do not resolve", () => {
    let model = new TopologyModel();
    model.createNodes(1);
    assert.throws(() => model.addressOf(0), HostNameUnresolvedException);
    assert.throws(() => model.addressOf(5), HostNameUnresolvedException);
});
